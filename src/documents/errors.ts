/**
 * Document error classes
 *
 * {@link UnsupportedFormatError} and {@link FileAccessError} are raised
 * before a Document exists. {@link DecodeError} is raised by decoders while a
 * pipeline runs and ends up as the Parsing stage's failure.
 *
 * @module documents/errors
 */

/**
 * Optional context attached to a document error
 */
export interface DocumentErrorOptions {
  /** Original error that caused this error */
  cause?: Error;
  /** @default false */
  retryable?: boolean;
  /** File being read or decoded */
  filePath?: string;
}

/**
 * Base error class for document handling
 *
 * @example
 * ```typescript
 * try {
 *   await decoder.decode("/data/movies.csv", "csv");
 * } catch (error) {
 *   if (error instanceof DocumentError) {
 *     console.error(`Error [${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */
export class DocumentError extends Error {
  /**
   * Error code for categorization and handling
   */
  public readonly code: string;

  /**
   * Original error that caused this error (if any)
   */
  public override readonly cause?: Error;

  /**
   * Indicates whether this error represents a transient failure that may succeed on retry
   */
  public readonly retryable: boolean;

  /** File the error relates to, when known */
  public readonly filePath?: string;

  /**
   * Create a new DocumentError
   *
   * @param message - Human-readable error message
   * @param code - Error code for categorization (default: 'DOCUMENT_ERROR')
   * @param options - Cause, retryability and file path
   */
  constructor(message: string, code: string = "DOCUMENT_ERROR", options?: DocumentErrorOptions) {
    super(message);
    this.name = "DocumentError";
    this.code = code;
    this.cause = options?.cause;
    this.retryable = options?.retryable ?? false;
    this.filePath = options?.filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options?.cause?.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * The declared or detected format is not one the pipeline accepts
 */
export class UnsupportedFormatError extends DocumentError {
  public readonly format: string;

  constructor(message: string, format: string, options?: DocumentErrorOptions) {
    super(message, "UNSUPPORTED_FORMAT", options);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

/**
 * File could not be stat'ed or read
 */
export class FileAccessError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "FILE_ACCESS_ERROR", options);
    this.name = "FileAccessError";
  }
}

/**
 * Content is malformed for its declared format
 *
 * @example
 * ```typescript
 * throw new DecodeError("Invalid JSON: Unexpected token } at position 17", {
 *   filePath,
 *   cause: error,
 * });
 * ```
 */
export class DecodeError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "DECODE_ERROR", options);
    this.name = "DecodeError";
  }
}

/**
 * Decoding did not finish within the decoder's time limit
 */
export class DecodeTimeoutError extends DocumentError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: DocumentErrorOptions) {
    super(message, "DECODE_TIMEOUT", { ...options, retryable: options?.retryable ?? true });
    this.name = "DecodeTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A Document lifecycle rule was broken: a terminal Document was mutated, or
 * its status or progress would have gone backwards
 */
export class DocumentStateError extends DocumentError {
  public readonly documentId: string;

  constructor(message: string, documentId: string) {
    super(message, "DOCUMENT_STATE_ERROR");
    this.name = "DocumentStateError";
    this.documentId = documentId;
  }
}
