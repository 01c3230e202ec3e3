/**
 * Production container: Supabase (pgvector) + OpenAI.
 */

import OpenAI from 'openai';
import { loadConfig, type AppConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { ConfigurationError } from './errors.js';
import { ConsoleLogProvider, OpenAIChatModel, OpenAIEmbeddingProvider } from './providers/index.js';
import { SupabaseCourseRepository } from './repositories/SupabaseCourseRepository.js';

let cached: Container | null = null;

export function getProductionContainer(config: AppConfig = loadConfig()): Container {
  if (cached) return cached;

  const required: Array<[string, string | null]> = [
    ['OPENAI_API_KEY', config.openaiApiKey],
    ['SUPABASE_URL', config.supabaseUrl],
    ['SUPABASE_SERVICE_ROLE_KEY', config.supabaseServiceRoleKey],
  ];
  const missing = required
    .filter(([, value]) => !value)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      { missing }
    );
  }

  const openai = new OpenAI({ apiKey: config.openaiApiKey ?? undefined });
  const db = getSupabaseClient(config.supabaseUrl ?? undefined, config.supabaseServiceRoleKey ?? undefined);

  cached = createContainer({
    courseRepo: new SupabaseCourseRepository(db),
    embeddingProvider: new OpenAIEmbeddingProvider({
      client: openai,
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
    }),
    languageModel: new OpenAIChatModel({ client: openai, model: config.openaiModel }),
    logProvider: new ConsoleLogProvider({
      outputToConsole: config.logToConsole,
      minLevel: config.logLevel,
    }),
    config,
  });

  return cached;
}
