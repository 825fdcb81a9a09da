/**
 * Chunking error classes
 *
 * @module ingestion/errors
 */

/**
 * Invalid chunker configuration
 */
export class ChunkerConfigError extends Error {
  public readonly code = "CHUNKER_CONFIG_ERROR";
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = "ChunkerConfigError";
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}
