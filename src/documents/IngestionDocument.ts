/**
 * Ingestion job lifecycle
 *
 * @module documents/IngestionDocument
 */

import { randomUUID } from "node:crypto";
import { DocumentStateError } from "./errors.js";
import type { DocumentFormat, DocumentSnapshot, DocumentStatus } from "./types.js";

/**
 * Rank of each status for the no-regression rule. Terminal statuses share
 * the top rank.
 */
const STATUS_RANK: Record<DocumentStatus, number> = {
  pending: 0,
  parsing: 1,
  extracting_entities: 2,
  extracting_relations: 3,
  validating: 4,
  storing: 5,
  completed: 6,
  failed: 6,
};

/**
 * Position of a status in the lifecycle order
 *
 * @param status - Document status
 * @returns 0 for `pending` up to 6 for the terminal statuses
 */
export function statusRank(status: DocumentStatus): number {
  return STATUS_RANK[status];
}

/** `completed` or `failed` */
export function isTerminalStatus(status: DocumentStatus): boolean {
  return status === "completed" || status === "failed";
}

/**
 * Fields supplied when a document is created
 */
export interface IngestionDocumentInit {
  /** Base name of the source file */
  filename: string;
  format: DocumentFormat;
  /** Size of the source file in bytes */
  sizeBytes: number;
  /** Generated when omitted */
  id?: string;
  /** Defaults to the time of construction */
  uploadedAt?: Date;
  /** Copied on construction, e.g. `{ filePath }` */
  metadata?: Record<string, unknown>;
}

/**
 * One file's ingestion job
 *
 * Created `pending` with progress 0 and driven forward by the pipeline
 * executor. Status never moves back, progress never decreases, and once
 * `completed` or `failed` the document is frozen. A retry is a new document.
 *
 * @example
 * ```typescript
 * const document = new IngestionDocument({ filename: "movies.csv", format: "csv", sizeBytes: 2048 });
 * document.advance("parsing", 0);
 * document.advance("extracting_relations", 50);
 * document.markCompleted(5, 4);
 * document.toJSON().progress; // 100
 * ```
 */
export class IngestionDocument {
  readonly id: string;
  readonly filename: string;
  readonly format: DocumentFormat;
  readonly sizeBytes: number;
  readonly uploadedAt: Date;
  readonly metadata: Record<string, unknown>;

  private _status: DocumentStatus = "pending";
  private _progress = 0;
  private _entitiesExtracted = 0;
  private _relationsExtracted = 0;
  private _error: string | undefined;
  private _processedAt: Date | undefined;

  /**
   * @param init - File details; `id` and `uploadedAt` are generated when omitted
   */
  constructor(init: IngestionDocumentInit) {
    this.id = init.id ?? randomUUID();
    this.filename = init.filename;
    this.format = init.format;
    this.sizeBytes = init.sizeBytes;
    this.uploadedAt = init.uploadedAt ?? new Date();
    this.metadata = { ...init.metadata };
  }

  get status(): DocumentStatus {
    return this._status;
  }

  get progress(): number {
    return this._progress;
  }

  get entitiesExtracted(): number {
    return this._entitiesExtracted;
  }

  get relationsExtracted(): number {
    return this._relationsExtracted;
  }

  /** Set iff status is `failed` */
  get error(): string | undefined {
    return this._error;
  }

  /** Time the document reached `completed` or `failed` */
  get processedAt(): Date | undefined {
    return this._processedAt;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /**
   * Move to a non-terminal status with a new progress value
   *
   * Re-entering the current status is allowed (several stages share one
   * status). Progress is clamped into [0, 100].
   *
   * @param status - Next lifecycle status; must not rank below the current one
   * @param progress - Percentage complete; must not be below the current value
   * @throws {DocumentStateError} if the document is terminal, `status` is
   * terminal, or the move would regress status or progress
   */
  advance(status: DocumentStatus, progress: number): void {
    this.assertMutable();
    if (isTerminalStatus(status)) {
      throw new DocumentStateError(
        `Use markCompleted() or markFailed() to finish document ${this.id}`,
        this.id
      );
    }
    if (STATUS_RANK[status] < STATUS_RANK[this._status]) {
      throw new DocumentStateError(
        `Document ${this.id} cannot move from ${this._status} back to ${status}`,
        this.id
      );
    }
    const clamped = clampProgress(progress);
    if (clamped < this._progress) {
      throw new DocumentStateError(
        `Document ${this.id} progress cannot decrease from ${this._progress} to ${clamped}`,
        this.id
      );
    }
    this._status = status;
    this._progress = clamped;
  }

  /**
   * Finish successfully with progress 100 and the final counts
   *
   * Sets `processedAt`. The document cannot change afterwards.
   *
   * @param entitiesExtracted - Entities in the final merged set
   * @param relationsExtracted - Relations in the final merged set
   * @throws {DocumentStateError} if the document is already terminal
   */
  markCompleted(entitiesExtracted: number, relationsExtracted: number): void {
    this.assertMutable();
    this._status = "completed";
    this._progress = 100;
    this._entitiesExtracted = entitiesExtracted;
    this._relationsExtracted = relationsExtracted;
    this._processedAt = new Date();
  }

  /**
   * Finish with an error. Progress stays where the run stopped.
   *
   * @param error - Failure message; an empty string is replaced with
   *   "Ingestion failed"
   * @throws {DocumentStateError} if the document is already terminal
   */
  markFailed(error: string): void {
    this.assertMutable();
    this._status = "failed";
    this._error = error.length > 0 ? error : "Ingestion failed";
    this._processedAt = new Date();
  }

  /**
   * Plain snapshot with ISO-8601 timestamps
   *
   * `error` and `processedAt` are present only when set.
   */
  toJSON(): DocumentSnapshot {
    return {
      id: this.id,
      filename: this.filename,
      format: this.format,
      sizeBytes: this.sizeBytes,
      status: this._status,
      progress: this._progress,
      entitiesExtracted: this._entitiesExtracted,
      relationsExtracted: this._relationsExtracted,
      ...(this._error !== undefined && { error: this._error }),
      uploadedAt: this.uploadedAt.toISOString(),
      ...(this._processedAt !== undefined && { processedAt: this._processedAt.toISOString() }),
      metadata: { ...this.metadata },
    };
  }

  private assertMutable(): void {
    if (this.isTerminal) {
      throw new DocumentStateError(
        `Document ${this.id} is already ${this._status} and cannot change`,
        this.id
      );
    }
  }
}

function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) {
    return 0;
  }
  return Math.min(100, Math.max(0, progress));
}
