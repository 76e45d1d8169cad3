import { ConfigurationError } from './errors';
import { isLogLevel, LogLevel } from './logger';

export interface EmbeddingConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
  /** Models such as text-embedding-ada-002 reject the `dimensions` request parameter. */
  sendDimensions: boolean;
  documentPrefix: string;
  queryPrefix: string;
}

export interface DatabaseConfig {
  connectionString: string;
  dimensions: number;
  insertBatchSize: number;
  ivfflatLists: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  embedding: EmbeddingConfig;
  sentencesPerChunk: number;
  searchTopK: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, { variable: name });
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, { variable: name });
}

function readRequired(env: Env, ...names: string[]): string {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  throw new ConfigurationError(`${names[0]} is not set`, { variable: names[0] });
}

/**
 * Builds the process configuration once at startup. Both entry points need
 * the connection string and the provider credential, so their absence is
 * always fatal.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const connectionString = readRequired(env, 'POSTGRES_URL');
  const apiKey = readRequired(env, 'EMBEDDING_API_KEY', 'OPENAI_API_KEY');
  const dimensions = readPositiveInt(env, 'EMBEDDING_DIMENSIONS', 768);

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`, { variable: 'LOG_LEVEL' });
  }

  return {
    database: {
      connectionString,
      dimensions,
      insertBatchSize: readPositiveInt(env, 'INSERT_BATCH_SIZE', 100),
      ivfflatLists: readPositiveInt(env, 'IVFFLAT_LISTS', 100),
    },
    embedding: {
      apiKey,
      baseURL: env.EMBEDDING_BASE_URL?.trim() || undefined,
      model: env.EMBEDDING_MODEL?.trim() || 'text-embedding-3-small',
      dimensions,
      sendDimensions: readBoolean(env, 'EMBEDDING_SEND_DIMENSIONS', true),
      documentPrefix: env.EMBEDDING_DOCUMENT_PREFIX ?? '',
      queryPrefix: env.EMBEDDING_QUERY_PREFIX ?? '',
    },
    sentencesPerChunk: readPositiveInt(env, 'CHUNK_SENTENCES', 3),
    searchTopK: readPositiveInt(env, 'SEARCH_TOP_K', 5),
    logLevel,
  };
}
