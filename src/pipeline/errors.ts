/**
 * Pipeline error taxonomy
 *
 * - {@link CollaboratorError}: a decoder-independent collaborator (embedding,
 *   NER, extraction agent, graph store, entity index) failed. Thrown inside a
 *   stage, converted to a `failed` StageResult by the stage runner.
 * - {@link PipelineTimeoutError}: the caller's deadline expired.
 * - {@link PipelineConfigurationError}: a malformed stage list. The only
 *   error {@link Pipeline.execute} lets escape.
 *
 * Validation problems are values ({@link ValidationIssue}), not exceptions.
 *
 * @module pipeline/errors
 */

/**
 * Names of the collaborators a stage may call
 */
export type CollaboratorName = "embedding" | "ner" | "extraction" | "graph" | "entity-index";

/**
 * Base class for failures raised by external collaborators
 */
export abstract class CollaboratorError extends Error {
  /** Error code for categorization */
  readonly code: string;

  /** Which collaborator failed */
  readonly collaborator: CollaboratorName;

  /** Whether the failure is transient */
  readonly retryable: boolean;

  /**
   * Original error that caused this error (if any)
   *
   * Narrower than the built-in `Error.cause`, which accepts any value.
   */
  override readonly cause?: Error;

  /**
   * @param message - Human-readable error message
   * @param collaborator - Collaborator that failed
   * @param options - Error code, retryability (default false) and cause;
   *   the cause's stack is appended to this error's stack
   */
  protected constructor(
    message: string,
    collaborator: CollaboratorName,
    options: { code: string; retryable?: boolean; cause?: Error }
  ) {
    super(message);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options.cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * The deadline wrapping a pipeline run expired
 */
export class PipelineTimeoutError extends Error {
  readonly code = "PIPELINE_TIMEOUT";

  /** Configured deadline, when the abort came from a timeout */
  readonly timeoutMs?: number;

  /** Stage that was running or about to run */
  readonly stageName?: string;

  /**
   * @param message - Human-readable error message
   * @param options - Deadline and interrupted stage, when known
   */
  constructor(message: string, options?: { timeoutMs?: number; stageName?: string }) {
    super(message);
    this.name = "PipelineTimeoutError";
    this.timeoutMs = options?.timeoutMs;
    this.stageName = options?.stageName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineTimeoutError);
    }
  }
}

/**
 * A pipeline was built from an invalid stage list
 */
export class PipelineConfigurationError extends Error {
  readonly code = "PIPELINE_CONFIGURATION";

  constructor(message: string) {
    super(message);
    this.name = "PipelineConfigurationError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineConfigurationError);
    }
  }
}

/**
 * Check for a collaborator failure regardless of which area raised it
 *
 * @param error - Any caught value
 * @returns true for embedding, NER, extraction, graph and entity-index errors
 */
export function isCollaboratorError(error: unknown): error is CollaboratorError {
  return error instanceof CollaboratorError;
}
