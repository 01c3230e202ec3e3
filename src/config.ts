/**
 * Runtime configuration, read from environment variables.
 */

import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';

export interface AppConfig {
  openaiApiKey: string | null;
  openaiModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
  /** Max characters per course chunk. */
  chunkSize: number;
  /** Characters of trailing context repeated at the start of the next chunk. */
  chunkOverlap: number;
  /** Hits returned per semantic search. */
  maxResults: number;
  /** Exchanges remembered per session. */
  maxHistory: number;
  maxToolRounds: number;
  docsPath: string;
  port: number;
  logLevel: LogLevel;
  logToConsole: boolean;
}

/** Width of the `vector(...)` columns in supabase/migrations. */
export const STORED_EMBEDDING_DIMENSIONS = 1536;

export const DEFAULT_CONFIG: AppConfig = {
  openaiApiKey: null,
  openaiModel: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-small',
  embeddingDimensions: STORED_EMBEDDING_DIMENSIONS,
  supabaseUrl: null,
  supabaseServiceRoleKey: null,
  chunkSize: 800,
  chunkOverlap: 100,
  maxResults: 5,
  maxHistory: 2,
  maxToolRounds: 2,
  docsPath: '../docs',
  port: 8000,
  logLevel: 'info',
  logToConsole: true,
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error`, {
      value: logLevel,
    });
  }

  const config: AppConfig = {
    openaiApiKey: env.OPENAI_API_KEY || null,
    openaiModel: env.OPENAI_MODEL || DEFAULT_CONFIG.openaiModel,
    embeddingModel: env.EMBEDDING_MODEL || DEFAULT_CONFIG.embeddingModel,
    embeddingDimensions: readInt(env, 'EMBEDDING_DIMENSIONS', DEFAULT_CONFIG.embeddingDimensions, 1),
    supabaseUrl: env.SUPABASE_URL || null,
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || null,
    chunkSize: readInt(env, 'CHUNK_SIZE', DEFAULT_CONFIG.chunkSize, 1),
    chunkOverlap: readInt(env, 'CHUNK_OVERLAP', DEFAULT_CONFIG.chunkOverlap, 0),
    maxResults: readInt(env, 'MAX_RESULTS', DEFAULT_CONFIG.maxResults, 1),
    maxHistory: readInt(env, 'MAX_HISTORY', DEFAULT_CONFIG.maxHistory, 1),
    maxToolRounds: readInt(env, 'MAX_TOOL_ROUNDS', DEFAULT_CONFIG.maxToolRounds, 1),
    docsPath: env.DOCS_PATH || DEFAULT_CONFIG.docsPath,
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port, 0),
    logLevel,
    logToConsole: env.LOG_TO_CONSOLE === undefined ? DEFAULT_CONFIG.logToConsole : env.LOG_TO_CONSOLE !== 'false',
  };

  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigurationError('CHUNK_OVERLAP must be smaller than CHUNK_SIZE', {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
    });
  }

  if (config.embeddingDimensions !== STORED_EMBEDDING_DIMENSIONS) {
    throw new ConfigurationError(
      `EMBEDDING_DIMENSIONS must be ${STORED_EMBEDDING_DIMENSIONS} to match the vector columns`,
      { value: config.embeddingDimensions }
    );
  }

  return config;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}`, { value: raw });
  }
  return value;
}
