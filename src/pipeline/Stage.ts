/**
 * Stage contract and runner
 *
 * @module pipeline/Stage
 */

import { performance } from "node:perf_hooks";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { isCollaboratorError } from "./errors.js";
import type { PipelineContext } from "./PipelineContext.js";
import type { StageKind, StageResult } from "./types.js";

/**
 * Result metadata describing a thrown value: its class name, code,
 * collaborator and retryability where present
 */
function errorMetadata(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { exceptionType: typeof error };
  }
  const metadata: Record<string, unknown> = { exceptionType: error.name };
  if ("code" in error && typeof error.code === "string") {
    metadata["errorCode"] = error.code;
  }
  if (isCollaboratorError(error)) {
    metadata["collaborator"] = error.collaborator;
    metadata["retryable"] = error.retryable;
  } else if ("retryable" in error && typeof error.retryable === "boolean") {
    metadata["retryable"] = error.retryable;
  }
  return metadata;
}

/**
 * One step of an ingestion pipeline
 *
 * Subclasses implement {@link execute}; callers use {@link run}, which
 * never throws. A stage computes its outputs locally and writes them to the
 * context only once it knows it will succeed.
 *
 * @example
 * ```typescript
 * class CountingStage extends Stage {
 *   constructor() {
 *     super("Counting");
 *   }
 *   async execute(context: PipelineContext): Promise<StageResult> {
 *     return this.completed({ records: context.records.length });
 *   }
 * }
 * ```
 */
export abstract class Stage {
  readonly kind: StageKind = "real";
  private _enabled = true;
  private _logger: pino.Logger | null = null;

  /**
   * @param name - Stage name, unique within a pipeline; also selects the
   *   document status the executor moves to before the stage runs
   */
  constructor(readonly name: string) {}

  protected get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger(`pipeline:stage:${this.name.toLowerCase()}`);
    }
    return this._logger;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  /**
   * Do the stage's work against `context`
   *
   * May throw; {@link run} converts the error into a `failed` result.
   * Implementations call `context.assertActive()` before writing their
   * outputs so that a run cut off by its deadline leaves the context as it was.
   *
   * @param context - Shared run state
   * @returns Result built with {@link completed}, {@link skipped} or {@link failed}
   */
  abstract execute(context: PipelineContext): Promise<StageResult>;

  /**
   * Time {@link execute} and turn anything it throws into a `failed` result
   *
   * A disabled stage is not executed and reports `skipped` with reason
   * `disabled`.
   *
   * @param context - Shared run state
   * @returns Result stamped with the measured duration; never rejects
   */
  async run(context: PipelineContext): Promise<StageResult> {
    if (!this._enabled) {
      return this.result("skipped", { metadata: { reason: "disabled" } });
    }

    const start = performance.now();
    let result: StageResult;
    try {
      result = await this.execute(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result = this.failed(message, errorMetadata(error));
      this.logger.error({ err: error, file: context.filename }, `${this.name} stage threw`);
    }

    const durationMs = Math.max(0, performance.now() - start);
    if (result.status === "failed" && !result.error) {
      result = { ...result, error: `${this.name} stage failed` };
    }
    return { ...result, durationMs, timestamp: new Date() };
  }

  protected completed(
    outputData?: Record<string, unknown>,
    metadata: Record<string, unknown> = {}
  ): StageResult {
    return this.result("completed", { outputData, metadata });
  }

  /**
   * @param reason - Short machine-readable reason stored as `metadata.reason`
   */
  protected skipped(reason: string, metadata: Record<string, unknown> = {}): StageResult {
    return this.result("skipped", { metadata: { reason, ...metadata } });
  }

  protected failed(error: string, metadata: Record<string, unknown> = {}): StageResult {
    return this.result("failed", { error, metadata });
  }

  private result(
    status: StageResult["status"],
    fields: Pick<StageResult, "outputData" | "error"> & { metadata?: Record<string, unknown> }
  ): StageResult {
    return {
      stageName: this.name,
      status,
      durationMs: 0,
      ...(fields.outputData !== undefined && { outputData: fields.outputData }),
      ...(fields.error !== undefined && { error: fields.error }),
      metadata: fields.metadata ?? {},
      timestamp: new Date(),
    };
  }
}

/**
 * Placeholder for a stage with no implemented behavior. Always completes,
 * tagged `noop: true`.
 */
export class NoOpStage extends Stage {
  override readonly kind: StageKind = "noop";

  async execute(context: PipelineContext): Promise<StageResult> {
    context.assertActive(this.name);
    this.apply(context);
    return this.completed(undefined, { noop: true });
  }

  /**
   * Pass-through hook for subclasses that must still hand data forward
   */
  protected apply(_context: PipelineContext): void {}
}
