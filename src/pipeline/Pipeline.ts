/**
 * Sequential pipeline executor
 *
 * @module pipeline/Pipeline
 */

import type pino from "pino";
import { statusRank } from "../documents/IngestionDocument.js";
import { getComponentLogger } from "../logging/index.js";
import { PipelineConfigurationError, PipelineTimeoutError } from "./errors.js";
import type { PipelineContext } from "./PipelineContext.js";
import type { Stage } from "./Stage.js";
import {
  STAGE_DOCUMENT_STATUS,
  type ExecuteOptions,
  type PipelineRunSummary,
  type StageResult,
} from "./types.js";

/**
 * Outcome of racing a stage against the run's abort signal
 */
type StageRace = { kind: "result"; result: StageResult } | { kind: "aborted"; error: PipelineTimeoutError };

/**
 * Recover the timeout error carried by an aborted signal
 *
 * The deadline timer and the caller-cancel listener both abort with a
 * {@link PipelineTimeoutError}; any other abort reason is wrapped in one
 * naming the stage that was interrupted.
 *
 * @param signal - Aborted run signal
 * @param stageName - Stage that was running or about to run
 * @returns Timeout error to report for the stage
 */
function timeoutFrom(signal: AbortSignal, stageName: string): PipelineTimeoutError {
  const reason: unknown = signal.reason;
  if (reason instanceof PipelineTimeoutError) {
    return reason;
  }
  return new PipelineTimeoutError(`Pipeline run aborted before ${stageName} finished`, {
    stageName,
  });
}

/**
 * Build the failed result recorded for a stage cut off by the deadline
 *
 * @param stageName - Stage being reported
 * @param error - Timeout that stopped the run
 * @param dispatched - Whether the stage had started before the abort
 */
function timeoutResult(stageName: string, error: PipelineTimeoutError, dispatched: boolean): StageResult {
  return {
    stageName,
    status: "failed",
    durationMs: 0,
    error: error.message,
    metadata: {
      exceptionType: "PipelineTimeoutError",
      errorCode: error.code,
      dispatched,
    },
    timestamp: new Date(),
  };
}

/**
 * Progress percentage before the stage at `index` runs
 *
 * @param index - 0-based position of the stage about to run
 * @param total - Number of stages in the pipeline
 * @returns `100 * index / total`, unrounded; 0 for an empty pipeline
 */
export function progressBefore(index: number, total: number): number {
  return total === 0 ? 0 : (100 * index) / total;
}

/**
 * Ordered list of stages run one after another against a single context
 *
 * Before each stage the bound document (if any) moves to the stage's status
 * and progress `100 * index / total`. The first failed stage stops
 * the run and fails the document with that stage's error; when every stage
 * completes or is skipped the document is completed with progress 100.
 *
 * @example
 * ```typescript
 * const pipeline = new Pipeline("minimal", [parsing, extraction, storage]);
 * const context = new PipelineContext({ filePath, format: "csv", document });
 * const summary = await pipeline.execute(context, { timeoutMs: 60_000 });
 * if (!summary.success) {
 *   console.error(summary.failedStage, context.errors);
 * }
 * ```
 */
export class Pipeline {
  private readonly stages: readonly Stage[];
  private _logger: pino.Logger | null = null;

  /**
   * Create a pipeline over an ordered stage list
   *
   * The list is copied; later changes to the caller's array do not affect
   * the pipeline.
   *
   * @param name - Pipeline name used in logs, progress events and summaries
   * @param stages - Stages to run, in order
   * @throws {PipelineConfigurationError} for an empty stage list or duplicate stage names
   */
  constructor(
    readonly name: string,
    stages: readonly Stage[]
  ) {
    if (stages.length === 0) {
      throw new PipelineConfigurationError(`Pipeline "${name}" has no stages`);
    }
    const seen = new Set<string>();
    for (const stage of stages) {
      if (seen.has(stage.name)) {
        throw new PipelineConfigurationError(
          `Pipeline "${name}" has duplicate stage "${stage.name}"`
        );
      }
      seen.add(stage.name);
    }
    this.stages = [...stages];
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("pipeline:executor");
    }
    return this._logger;
  }

  /**
   * Stage names in execution order
   */
  getStageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Look up a stage by its name
   *
   * @param name - Stage name, e.g. "extraction"
   * @returns The stage, or undefined when the pipeline has none by that name
   */
  getStage(name: string): Stage | undefined {
    return this.stages.find((stage) => stage.name === name);
  }

  /**
   * Re-enable a previously disabled stage
   *
   * @param name - Stage name
   * @returns false when no stage has that name
   */
  enableStage(name: string): boolean {
    const stage = this.getStage(name);
    stage?.enable();
    return stage !== undefined;
  }

  /**
   * Disable a stage so later runs skip it
   *
   * A disabled stage still reports a `skipped` result and still moves the
   * document's progress forward.
   *
   * @param name - Stage name
   * @returns false when no stage has that name
   */
  disableStage(name: string): boolean {
    const stage = this.getStage(name);
    stage?.disable();
    return stage !== undefined;
  }

  /**
   * Run every stage in order against `context`
   *
   * Each stage's result is recorded on the context before the next stage
   * starts. The first failed stage stops the run; later stages are neither
   * run nor recorded. When `options.timeoutMs` elapses, or `options.signal`
   * aborts, the running stage is reported as failed with a
   * {@link PipelineTimeoutError} and the document is failed with its message.
   *
   * Never throws for runtime conditions: stage failures and deadline expiry
   * are reported through the summary, the context and the document.
   *
   * @param context - Run state shared by every stage; its `signal` is replaced
   *   with the run's own abort signal
   * @param options - Deadline, caller cancellation and progress callback
   * @returns Summary naming the failed stage, if any, and whether the
   *   deadline expired
   *
   * @example
   * ```typescript
   * const summary = await pipeline.execute(context, {
   *   timeoutMs: 30_000,
   *   onProgress: (event) => console.log(event.stage, event.progress),
   * });
   * ```
   */
  async execute(context: PipelineContext, options: ExecuteOptions = {}): Promise<PipelineRunSummary> {
    const controller = new AbortController();
    const cleanup = this.bindDeadline(controller, options);
    context.signal = controller.signal;

    const total = this.stages.length;
    let failedStage: string | undefined;
    let timedOut = false;

    this.logger.info(
      { pipeline: this.name, file: context.filename, stages: total, documentId: context.document?.id },
      "Pipeline started"
    );

    try {
      for (const [index, stage] of this.stages.entries()) {
        this.enterStage(context, stage, index, total, options);

        let result: StageResult;
        if (controller.signal.aborted) {
          result = timeoutResult(stage.name, timeoutFrom(controller.signal, stage.name), false);
          timedOut = true;
        } else {
          const race = await this.raceAbort(stage.run(context), controller.signal, stage.name);
          if (race.kind === "aborted") {
            result = timeoutResult(stage.name, race.error, true);
            timedOut = true;
          } else {
            result = race.result;
          }
        }

        context.recordStageResult(result);
        this.logger.debug(
          { pipeline: this.name, stage: stage.name, status: result.status, durationMs: result.durationMs },
          "Stage finished"
        );

        if (result.status === "failed") {
          const message = result.error ?? `${stage.name} stage failed`;
          failedStage = stage.name;
          context.addError(`${stage.name}: ${message}`);
          this.failDocument(context, message);
          break;
        }
      }
    } finally {
      cleanup();
      context.markFinished();
    }

    const success = failedStage === undefined && context.isSuccessful();
    if (success && context.document && !context.document.isTerminal) {
      context.document.markCompleted(
        context.finalEntities().length,
        context.finalRelations().length
      );
    }

    const durationMs = context.getDurationMs();
    const logFields = {
      metric: "pipeline.duration_ms",
      value: durationMs,
      pipeline: this.name,
      file: context.filename,
      success,
      timedOut,
      ...(failedStage !== undefined && { failedStage }),
    };
    if (success) {
      this.logger.info(logFields, "Pipeline completed");
    } else {
      this.logger.warn(logFields, "Pipeline failed");
    }

    return {
      pipeline: this.name,
      success,
      timedOut,
      ...(failedStage !== undefined && { failedStage }),
      durationMs,
    };
  }

  /**
   * Move the document to the stage's status and emit the progress event
   */
  private enterStage(
    context: PipelineContext,
    stage: Stage,
    index: number,
    total: number,
    options: ExecuteOptions
  ): void {
    const document = context.document;
    const progress = progressBefore(index, total);
    const mapped = STAGE_DOCUMENT_STATUS[stage.name];

    if (document && !document.isTerminal) {
      // Hand-built stage lists may revisit an earlier status; the document keeps the later one
      const status =
        mapped !== undefined && statusRank(mapped) >= statusRank(document.status)
          ? mapped
          : document.status;
      document.advance(status, Math.max(progress, document.progress));
    }

    options.onProgress?.({
      pipeline: this.name,
      stage: stage.name,
      index,
      total,
      progress,
      status: document?.status ?? mapped ?? null,
    });
  }

  private failDocument(context: PipelineContext, message: string): void {
    const document = context.document;
    if (document && !document.isTerminal) {
      document.markFailed(message);
    }
  }

  /**
   * Resolve with the stage result, or with the abort if the signal fires
   * first. A stage that loses the race keeps running until its collaborator
   * call returns; its result is discarded.
   */
  private raceAbort(
    running: Promise<StageResult>,
    signal: AbortSignal,
    stageName: string
  ): Promise<StageRace> {
    return new Promise<StageRace>((resolve) => {
      const onAbort = (): void => {
        resolve({ kind: "aborted", error: timeoutFrom(signal, stageName) });
      };
      signal.addEventListener("abort", onAbort, { once: true });

      running.then(
        (result) => {
          signal.removeEventListener("abort", onAbort);
          resolve({ kind: "result", result });
        },
        (error: unknown) => {
          // run() does not reject; kept so a broken stage cannot hang the pipeline
          signal.removeEventListener("abort", onAbort);
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error({ err: error, stage: stageName }, "Stage runner rejected");
          resolve({
            kind: "result",
            result: {
              stageName,
              status: "failed",
              durationMs: 0,
              error: message || `${stageName} stage failed`,
              metadata: { exceptionType: error instanceof Error ? error.name : typeof error },
              timestamp: new Date(),
            },
          });
        }
      );
    });
  }

  /**
   * Abort `controller` when the timeout elapses or the caller's signal fires
   *
   * @returns disposer that clears the timer and listener
   */
  private bindDeadline(controller: AbortController, options: ExecuteOptions): () => void {
    const { timeoutMs, signal } = options;
    let timer: NodeJS.Timeout | undefined;

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        controller.abort(
          new PipelineTimeoutError(`Pipeline "${this.name}" timed out after ${timeoutMs}ms`, {
            timeoutMs,
          })
        );
      }, timeoutMs);
    }

    const onCallerAbort = (): void => {
      controller.abort(new PipelineTimeoutError(`Pipeline "${this.name}" was cancelled`));
    };
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    return () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", onCallerAbort);
    };
  }
}
