/**
 * Error taxonomy for the document QA system.
 * A refusal is a normal answer and never surfaces as one of these.
 */

export enum ErrorCode {
  CONFIG = 'CONFIG_ERROR',
  EMBEDDING_SERVICE = 'EMBEDDING_SERVICE_ERROR',
  GENERATION = 'GENERATION_ERROR',
  EXTRACTION_SERVICE = 'EXTRACTION_SERVICE_ERROR',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  CORRUPT_INDEX = 'CORRUPT_INDEX',
  TIMEOUT = 'TIMEOUT',
  CANCELLED = 'CANCELLED'
}

export interface RagErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Base class for every error raised by the pipeline
 */
export class RagError extends Error {
  readonly retryable: boolean;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options: RagErrorOptions = {}
  ) {
    super(message);
    this.name = 'RagError';
    this.retryable = options.retryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Invalid parameter supplied by the caller
 */
export class ConfigError extends RagError {
  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(ErrorCode.CONFIG, `Invalid ${parameter}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class EmbeddingServiceError extends RagError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(ErrorCode.EMBEDDING_SERVICE, message, { cause, retryable: true });
    this.name = 'EmbeddingServiceError';
  }
}

export class GenerationError extends RagError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(ErrorCode.GENERATION, message, { cause, retryable: true });
    this.name = 'GenerationError';
  }
}

export class ExtractionServiceError extends RagError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(ErrorCode.EXTRACTION_SERVICE, message, { cause, retryable: true });
    this.name = 'ExtractionServiceError';
  }
}

/**
 * A vector does not have the dimension the index was created with
 */
export class DimensionMismatchError extends RagError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly chunkId?: string
  ) {
    super(
      ErrorCode.DIMENSION_MISMATCH,
      chunkId
        ? `Vector for ${chunkId} has dimension ${actual}, index expects ${expected}`
        : `Vector has dimension ${actual}, index expects ${expected}`
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * A persisted index cannot be loaded as-is; it has to be rebuilt
 */
export class CorruptIndexError extends RagError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(ErrorCode.CORRUPT_INDEX, `Corrupt index at ${path}: ${reason}`, { cause });
    this.name = 'CorruptIndexError';
  }
}

export class TimeoutError extends RagError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(ErrorCode.TIMEOUT, `${operation} timed out after ${timeoutMs}ms`, { retryable: true });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends RagError {
  constructor(public readonly operation: string) {
    super(ErrorCode.CANCELLED, `${operation} was cancelled`);
    this.name = 'CancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof RagError && error.retryable;
}

/**
 * One-line description with the error kind, for CLI output and logs
 */
export function describeError(error: unknown): string {
  if (error instanceof RagError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
