export enum ErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
  EMBEDDING_ERROR = 'EMBEDDING_ERROR',
  QUERY_EMBEDDING_ERROR = 'QUERY_EMBEDDING_ERROR',
  SCHEMA_ERROR = 'SCHEMA_ERROR',
  INSERT_ERROR = 'INSERT_ERROR',
  SEARCH_ERROR = 'SEARCH_ERROR',
}

export interface ErrorContext {
  filename?: string;
  filePath?: string;
  query?: string;
  chunkIndex?: number;
  [key: string]: unknown;
}

/**
 * Base class for every failure the pipelines surface to a caller.
 * The underlying library error, when there is one, is kept as `cause`.
 */
export class DocvecError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
    super(message, { cause });
    this.name = 'DocvecError';
    this.code = code;
    this.context = context;
  }
}

/** Missing or malformed credentials / connection settings. Never retried. */
export class ConfigurationError extends DocvecError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_ERROR, context);
    this.name = 'ConfigurationError';
  }
}

/** The store could not be reached. A fresh run may be retried. */
export class ConnectionFailure extends DocvecError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.CONNECTION_ERROR, {}, cause);
    this.name = 'ConnectionFailure';
  }
}

export class ExtractionFailure extends DocvecError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, ErrorCode.EXTRACTION_ERROR, { filePath }, cause);
    this.name = 'ExtractionFailure';
  }
}

export class EmbeddingFailure extends DocvecError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown, code: ErrorCode = ErrorCode.EMBEDDING_ERROR) {
    super(message, code, context, cause);
    this.name = 'EmbeddingFailure';
  }
}

/** Embedding the search query failed; there is no fallback ranking. */
export class QueryEmbeddingFailure extends EmbeddingFailure {
  constructor(query: string, cause?: unknown) {
    super(`Could not generate an embedding for the query: ${describeError(cause)}`, { query }, cause, ErrorCode.QUERY_EMBEDDING_ERROR);
    this.name = 'QueryEmbeddingFailure';
  }
}

export class SchemaSetupFailure extends DocvecError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.SCHEMA_ERROR, {}, cause);
    this.name = 'SchemaSetupFailure';
  }
}

/** A bulk insert failed; nothing from the batch was committed. */
export class InsertFailure extends DocvecError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, ErrorCode.INSERT_ERROR, context, cause);
    this.name = 'InsertFailure';
  }
}

export class SearchFailure extends DocvecError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.SEARCH_ERROR, {}, cause);
    this.name = 'SearchFailure';
  }
}

// Node's own errors can come from another realm, where `instanceof Error` fails.
export function errorProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  const value: unknown = Reflect.get(error, key);
  return value;
}

export function describeError(error: unknown): string {
  const message = errorProperty(error, 'message');
  if (typeof message === 'string') return message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}
