/**
 * Supabase client factory.
 * Uses the service-role key: the assistant runs server-side only.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigurationError } from './errors.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(url?: string, serviceRoleKey?: string): SupabaseClient {
  if (client) return client;

  const supabaseUrl = url ?? process.env.SUPABASE_URL;
  const key = serviceRoleKey ?? process.env.SUPABASE_SERVICE_ROLE_KEY;
  if (!supabaseUrl || !key) {
    throw new ConfigurationError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  }

  client = createClient(supabaseUrl, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
