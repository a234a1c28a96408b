export type RagErrorCode =
  | "CONFIGURATION"
  | "INGESTION"
  | "INDEX_UNAVAILABLE"
  | "QUERY"
  | "EMBEDDING";

export class RagError extends Error {
  constructor(
    public readonly code: RagErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RagError";
  }
}

/** Invalid settings: chunk sizes, result counts, embedding setup. Never retried. */
export class ConfigurationError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("CONFIGURATION", message, cause);
    this.name = "ConfigurationError";
  }
}

/** One document could not be turned into chunks; the rest of its batch continues. */
export class IngestionError extends RagError {
  constructor(
    public readonly source: string,
    message: string,
    cause?: unknown,
  ) {
    super("INGESTION", `${source}: ${message}`, cause);
    this.name = "IngestionError";
  }
}

/** The storage backend could not be read or written. */
export class IndexUnavailableError extends RagError {
  constructor(
    public readonly operation: string,
    message: string,
    cause?: unknown,
  ) {
    super("INDEX_UNAVAILABLE", `${operation} failed: ${message}`, cause);
    this.name = "IndexUnavailableError";
  }
}

export class QueryError extends RagError {
  constructor(message: string) {
    super("QUERY", message);
    this.name = "QueryError";
  }
}

export class EmbeddingError extends RagError {
  constructor(
    message: string,
    cause?: unknown,
    /** HTTP status of the provider response, when there was one. */
    public readonly status?: number,
  ) {
    super("EMBEDDING", message, cause);
    this.name = "EmbeddingError";
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}
