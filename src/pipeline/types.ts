/**
 * Pipeline value types
 *
 * @module pipeline/types
 */

import type { DocumentStatus } from "../documents/types.js";
import type { GraphStats } from "../graph/types.js";

export type StageStatus = "pending" | "running" | "completed" | "failed" | "skipped";

/**
 * `real` stages do work; `noop` stages are explicit placeholders that pass
 * data through unchanged
 */
export type StageKind = "real" | "noop";

/**
 * Outcome of one stage run
 *
 * `status === "failed"` implies a non-empty `error`; `durationMs >= 0`.
 */
export interface StageResult {
  stageName: string;
  status: StageStatus;
  durationMs: number;
  /** Stage-specific counts, e.g. `{ recordCount: 12 }` */
  outputData?: Record<string, unknown>;
  error?: string;
  /**
   * Skip reason, `noop: true`, or the exception type, code and collaborator
   * of a failure
   */
  metadata: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Canonical stage names. The executor maps these onto document statuses.
 */
export const STAGE_NAMES = {
  parsing: "Parsing",
  chunking: "Chunking",
  embedding: "Embedding",
  ner: "NER",
  extraction: "Extraction",
  transformation: "Transformation",
  enrichment: "Enrichment",
  validation: "Validation",
  storage: "Storage",
} as const;

export type StageName = (typeof STAGE_NAMES)[keyof typeof STAGE_NAMES];

/**
 * Document status entered before each stage runs
 */
export const STAGE_DOCUMENT_STATUS: Readonly<Record<string, DocumentStatus>> = {
  [STAGE_NAMES.parsing]: "parsing",
  [STAGE_NAMES.chunking]: "parsing",
  [STAGE_NAMES.embedding]: "extracting_entities",
  [STAGE_NAMES.ner]: "extracting_entities",
  [STAGE_NAMES.extraction]: "extracting_relations",
  [STAGE_NAMES.transformation]: "extracting_relations",
  [STAGE_NAMES.enrichment]: "extracting_relations",
  [STAGE_NAMES.validation]: "validating",
  [STAGE_NAMES.storage]: "storing",
};

/** Pre-configured pipelines the factory can build */
export const PIPELINE_KINDS = ["default", "free-text", "tabular", "minimal"] as const;

export type PipelineKind = (typeof PIPELINE_KINDS)[number];

export type ValidationSeverity = "error" | "warning";

/**
 * One data-model problem found by the Validation stage
 */
export interface ValidationIssue {
  severity: ValidationSeverity;
  target: "entity" | "relation";
  /** Identity of the offending item, e.g. `Person:tom hanks` */
  key: string;
  message: string;
}

/**
 * Result of checking the final entities and relations
 */
export interface ValidationReport {
  /** True iff `errors` is empty; warnings do not count */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  checkedEntities: number;
  checkedRelations: number;
}

/**
 * What the Storage stage wrote
 */
export interface StorageReport {
  entitiesStored: number;
  relationsStored: number;
  /** Gateway ids of the stored entities, in the order written */
  entityIds: string[];
  relationIds: string[];
  /** Graph totals read after the writes */
  graphStats: GraphStats | null;
}

/**
 * Emitted before each stage runs
 */
export interface ProgressEvent {
  pipeline: string;
  stage: string;
  /** 0-based position of the stage about to run */
  index: number;
  total: number;
  /** `100 * index / total`, unrounded */
  progress: number;
  /** Document status after entering the stage; null without a document or mapping */
  status: DocumentStatus | null;
}

/**
 * Options for {@link Pipeline.execute}
 */
export interface ExecuteOptions {
  /** Deadline for the whole run */
  timeoutMs?: number;
  /** External cancellation; treated like an expired deadline */
  signal?: AbortSignal;
  /** Called synchronously before each stage starts */
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * Returned by {@link Pipeline.execute}
 */
export interface PipelineRunSummary {
  pipeline: string;
  /** True iff no stage failed */
  success: boolean;
  /** The deadline expired or the caller's signal aborted */
  timedOut: boolean;
  /** First stage that failed; absent on success */
  failedStage?: string;
  durationMs: number;
}
