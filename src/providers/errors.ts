/**
 * Embedding provider errors
 *
 * @module providers/errors
 */

import { CollaboratorError } from "../pipeline/errors.js";

/**
 * Remove API keys and long token-like strings from a message
 *
 * @param message - Error message that may echo request data
 * @returns Message with `sk-` keys and 40+ character tokens redacted
 */
export function sanitizeMessage(message: string): string {
  let sanitized = message.replace(/sk-[a-zA-Z0-9_-]{20,}/g, "sk-***REDACTED***");
  sanitized = sanitized.replace(/\b[a-zA-Z0-9]{40,}\b/g, "***REDACTED***");
  return sanitized;
}

/**
 * Base error class for embedding failures. Messages are sanitized on
 * construction.
 *
 * Inherits `code`, `retryable` and `cause` from {@link CollaboratorError};
 * the collaborator is always "embedding".
 */
export class EmbeddingError extends CollaboratorError {
  /**
   * Create a new EmbeddingError
   *
   * @param message - Human-readable error message; API keys are redacted
   * @param code - Error code for categorization (default: 'EMBEDDING_ERROR')
   * @param retryable - Whether this error is retryable (default: false)
   * @param cause - Original error that caused this error
   */
  constructor(
    message: string,
    code: string = "EMBEDDING_ERROR",
    retryable: boolean = false,
    cause?: Error
  ) {
    super(sanitizeMessage(message), "embedding", { code, retryable, cause });
    this.name = "EmbeddingError";
  }
}

/**
 * Invalid or unauthorized API key. Not retryable.
 *
 * @example
 * ```typescript
 * try {
 *   await provider.generateEmbeddings(["Tom Hanks"]);
 * } catch (error) {
 *   if (error instanceof EmbeddingAuthenticationError) {
 *     console.error("Check OPENAI_API_KEY");
 *   }
 * }
 * ```
 */
export class EmbeddingAuthenticationError extends EmbeddingError {
  /**
   * @param message - Human-readable error message
   * @param cause - Error returned by the provider client
   */
  constructor(message: string, cause?: Error) {
    super(message, "AUTHENTICATION_ERROR", false, cause);
    this.name = "EmbeddingAuthenticationError";
  }
}

/**
 * Rate limit hit. Retryable, honoring `retryAfterMs` when the provider sent one.
 */
export class EmbeddingRateLimitError extends EmbeddingError {
  /**
   * Delay the provider asked for before the next request, in milliseconds
   */
  public readonly retryAfterMs?: number;

  /**
   * @param message - Human-readable error message
   * @param retryAfterMs - Parsed `retry-after` header, if present
   * @param cause - Error returned by the provider client
   */
  constructor(message: string, retryAfterMs?: number, cause?: Error) {
    super(message, "RATE_LIMIT_ERROR", true, cause);
    this.name = "EmbeddingRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Connection failure or 5xx. Retryable.
 */
export class EmbeddingNetworkError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", true, cause);
    this.name = "EmbeddingNetworkError";
  }
}

/**
 * Request exceeded the client timeout. Retryable.
 */
export class EmbeddingTimeoutError extends EmbeddingError {
  constructor(message: string, cause?: Error) {
    super(message, "TIMEOUT_ERROR", true, cause);
    this.name = "EmbeddingTimeoutError";
  }
}

/**
 * Invalid input or configuration. Not retryable.
 */
export class EmbeddingValidationError extends EmbeddingError {
  /**
   * Name of the offending parameter, e.g. "texts" or "apiKey"
   */
  public readonly parameterName?: string;

  /**
   * @param message - Human-readable error message
   * @param parameterName - Parameter that failed validation
   * @param cause - Underlying error, if any
   */
  constructor(message: string, parameterName?: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", false, cause);
    this.name = "EmbeddingValidationError";
    this.parameterName = parameterName;
  }
}
