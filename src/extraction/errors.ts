/**
 * Extraction and NER errors
 *
 * @module extraction/errors
 */

import { CollaboratorError } from "../pipeline/errors.js";

/** Options shared by the extraction error constructors */
interface ErrorOptions {
  retryable?: boolean;
  cause?: Error;
}

/**
 * A chat completion request failed. Raised by {@link ChatClient}
 * implementations and wrapped by the agent or NER service that issued it.
 */
export class ChatClientError extends Error {
  /** Category such as RATE_LIMIT_ERROR or AUTHENTICATION_ERROR */
  readonly code: string;
  /** Whether another attempt may succeed */
  readonly retryable: boolean;
  /** HTTP status when the provider returned one */
  readonly status?: number;
  override readonly cause?: Error;

  /**
   * @param message - Sanitized, human-readable error message
   * @param code - Error category
   * @param options - Retryability, HTTP status and cause
   */
  constructor(message: string, code: string, options: ErrorOptions & { status?: number } = {}) {
    super(message);
    this.name = "ChatClientError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The extraction agent could not produce candidates
 */
export class ExtractionError extends CollaboratorError {
  /** 1-based batch number that failed, when batching */
  readonly batch?: number;

  /**
   * @param message - Human-readable error message
   * @param code - Error code (default: 'EXTRACTION_ERROR')
   * @param options - Failed batch number, retryability and cause
   */
  constructor(message: string, code: string = "EXTRACTION_ERROR", options: ErrorOptions & { batch?: number } = {}) {
    super(message, "extraction", { code, ...options });
    this.name = "ExtractionError";
    this.batch = options.batch;
  }
}

/**
 * The NER service failed on a chunk
 */
export class NerError extends CollaboratorError {
  constructor(message: string, code: string = "NER_ERROR", options: ErrorOptions = {}) {
    super(message, "ner", { code, ...options });
    this.name = "NerError";
  }
}

/**
 * The model answered with something that is not the JSON array asked for
 */
export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseParseError";
  }
}
