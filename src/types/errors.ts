/**
 * Structured Error System for proverb-trawl
 *
 * Provides machine-readable errors with codes, context, and suggestions.
 */

/**
 * Error codes for trawling operations
 */
export type TrawlErrorCode =
  | 'INVALID_ARGUMENT'      // Bad option or parameter value
  | 'EMPTY_CORPUS'          // Generated corpus has no documents
  | 'CORPUS_FORMAT'         // Corpus file content not in the expected shape
  | 'SNAPSHOT_INVALID'      // Frequency/reference snapshot failed validation
  | 'STORAGE_ERROR'         // Filesystem read/write failure
  | 'LLM_ERROR'             // Model provider failure
  | 'CONFIG_ERROR'          // Environment configuration invalid
  | 'UNKNOWN_TOOL';         // MCP tool name not registered

/**
 * Structured error with code, message, and suggestions
 */
export interface TrawlError {
  code: TrawlErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending file, key or value
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping TrawlError for throw/catch patterns
 */
export class TrawlException extends Error {
  public readonly error: TrawlError;

  constructor(error: TrawlError) {
    super(error.message);
    this.name = 'TrawlException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrawlException);
    }
  }

  get code(): TrawlErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): TrawlError {
    return this.error;
  }
}

export function isTrawlException(value: unknown): value is TrawlException {
  return value instanceof TrawlException;
}

/**
 * Create an invalid argument error for a named option
 */
export function createInvalidArgumentError(
  name: string,
  value: unknown,
  expectation: string
): TrawlException {
  return new TrawlException({
    code: 'INVALID_ARGUMENT',
    message: `Invalid ${name}: ${String(value)} (expected ${expectation})`,
    context: name,
    details: { value },
  });
}

/**
 * Create a corpus format error
 */
export function createCorpusFormatError(
  file: string,
  message: string,
  line?: number
): TrawlException {
  return new TrawlException({
    code: 'CORPUS_FORMAT',
    message: line !== undefined
      ? `${file}:${line}: ${message}`
      : `${file}: ${message}`,
    suggestion: 'Use a JSON array of strings, JSON lines, or plain text with one document per line',
    context: file,
    ...(line !== undefined && { details: { line } }),
  });
}

export function createEmptyCorpusError(what: string = 'Generated corpus'): TrawlException {
  return new TrawlException({
    code: 'EMPTY_CORPUS',
    message: `${what} contains no documents`,
    suggestion: 'Generate a corpus first with `trawl generate` or check the input path',
  });
}

export function createStorageError(
  path: string,
  cause: unknown
): TrawlException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new TrawlException({
    code: 'STORAGE_ERROR',
    message: `Storage failure for ${path}: ${reason}`,
    context: path,
  });
}

export function createSnapshotError(
  message: string,
  issues?: string[]
): TrawlException {
  return new TrawlException({
    code: 'SNAPSHOT_INVALID',
    message: `Invalid snapshot: ${message}`,
    suggestion: 'Rebuild the snapshot with `trawl index`',
    ...(issues && { details: { issues } }),
  });
}

export function createLLMError(
  message: string,
  details?: Record<string, unknown>
): TrawlException {
  return new TrawlException({
    code: 'LLM_ERROR',
    message: `LLM provider failed: ${message}`,
    suggestion: 'Check OPENAI_BASE_URL, OPENAI_API_KEY and TRAWL_MODEL',
    details,
  });
}

export function createConfigError(issues: string[]): TrawlException {
  return new TrawlException({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${issues.join('; ')}`,
    suggestion: 'Fix the listed environment variables or your .env file',
    details: { issues },
  });
}

/**
 * Serialize a TrawlError for JSON output
 */
export function serializeTrawlError(error: TrawlError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic trawl error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: TrawlErrorCode,
  message: string,
  details?: Record<string, unknown>
): TrawlException {
  return new TrawlException({
    code,
    message,
    details,
  });
}
