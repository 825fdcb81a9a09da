/**
 * Per-run accumulator threaded through every stage
 *
 * @module pipeline/PipelineContext
 */

import { basename } from "node:path";
import type { IngestionDocument } from "../documents/IngestionDocument.js";
import type { DecodedMetadata, DocumentFormat, SourceRecord } from "../documents/types.js";
import type { NerMention } from "../extraction/types.js";
import type { Entity, Relation } from "../graph/types.js";
import type { TextChunk } from "../ingestion/types.js";
import { PipelineTimeoutError } from "./errors.js";
import type { StageResult, StorageReport, ValidationReport } from "./types.js";

/**
 * A NER mention tagged with the chunk it was found in
 */
export interface ChunkMention extends NerMention {
  /** Index into {@link PipelineContext.chunks} */
  chunkIndex: number;
}

/**
 * Constructor input for {@link PipelineContext}
 */
export interface PipelineContextInit {
  /** Path the Parsing stage decodes */
  filePath: string;
  format: DocumentFormat;
  /** Defaults to the base name of `filePath` */
  filename?: string;
  /** Document the executor drives through its lifecycle */
  document?: IngestionDocument;
}

/**
 * Mutable state of one pipeline run
 *
 * Each stage reads whatever earlier stages produced and writes only the
 * fields it owns. `stageResults` and `errors` are append-only. A context is
 * never shared between runs.
 */
export class PipelineContext {
  readonly filePath: string;
  readonly filename: string;
  readonly format: DocumentFormat;
  readonly document?: IngestionDocument;

  /** Set by the executor; aborted when the deadline expires */
  signal?: AbortSignal;

  // Parsing
  records: SourceRecord[] = [];
  metadata: DecodedMetadata | null = null;

  // Chunking / Embedding / NER
  chunks: TextChunk[] = [];
  embeddings: number[][] = [];
  mentions: ChunkMention[] = [];

  // Extraction
  entities: Entity[] = [];
  relations: Relation[] = [];

  // Enrichment
  enrichedEntities: Entity[] | null = null;
  enrichedRelations: Relation[] | null = null;

  /** Set by Validation; null when the stage did not run */
  validationReport: ValidationReport | null = null;
  /** Set by Storage after every batch is written */
  storage: StorageReport | null = null;

  private readonly _stageResults: StageResult[] = [];
  private readonly _errors: string[] = [];
  private readonly startedAt = Date.now();
  private finishedAt: number | null = null;

  /**
   * @param init - Source file, format and the document to drive, if any
   */
  constructor(init: PipelineContextInit) {
    this.filePath = init.filePath;
    this.filename = init.filename ?? basename(init.filePath);
    this.format = init.format;
    this.document = init.document;
  }

  /** One result per stage run, in order */
  get stageResults(): readonly StageResult[] {
    return this._stageResults;
  }

  get errors(): readonly string[] {
    return this._errors;
  }

  /**
   * @param message - Error text, conventionally prefixed with the stage name
   */
  addError(message: string): void {
    this._errors.push(message);
  }

  recordStageResult(result: StageResult): void {
    this._stageResults.push(result);
  }

  /**
   * Most recent result for a stage name
   *
   * @param stageName - Stage name, e.g. "Extraction"
   * @returns The last recorded result, or undefined if the stage never ran
   */
  getStageResult(stageName: string): StageResult | undefined {
    for (let i = this._stageResults.length - 1; i >= 0; i--) {
      const result = this._stageResults[i];
      if (result?.stageName === stageName) {
        return result;
      }
    }
    return undefined;
  }

  /**
   * True iff at least one stage ran and none failed
   */
  isSuccessful(): boolean {
    return (
      this._stageResults.length > 0 &&
      this._stageResults.every((result) => result.status === "completed" || result.status === "skipped")
    );
  }

  /** Enriched entities when produced, else the extracted ones */
  finalEntities(): Entity[] {
    return this.enrichedEntities ?? this.entities;
  }

  /** Enriched relations when produced, else the extracted ones */
  finalRelations(): Relation[] {
    return this.enrichedRelations ?? this.relations;
  }

  /**
   * Stages call this right before writing their outputs so that a stage
   * which outlives an expired deadline cannot change the context
   *
   * @param stageName - Stage to name in the error when the abort carried no
   *   timeout error of its own
   * @throws {PipelineTimeoutError} once the run's signal has aborted
   */
  assertActive(stageName?: string): void {
    if (this.signal?.aborted) {
      const reason: unknown = this.signal.reason;
      throw reason instanceof PipelineTimeoutError
        ? reason
        : new PipelineTimeoutError("Pipeline run was aborted", { stageName });
    }
  }

  /** Stop the duration clock; later calls keep the first time */
  markFinished(): void {
    this.finishedAt ??= Date.now();
  }

  /**
   * Milliseconds since construction, up to {@link markFinished} if called
   */
  getDurationMs(): number {
    return (this.finishedAt ?? Date.now()) - this.startedAt;
  }
}
