/**
 * Orchestrator types
 *
 * @module services/ingestion-types
 */

import type { DocumentStore } from "../documents/DocumentStore.js";
import type { DocumentSnapshot } from "../documents/types.js";
import type { GraphStats } from "../graph/types.js";
import type { PipelineFactory } from "../pipeline/PipelineFactory.js";
import type {
  PipelineKind,
  ProgressEvent,
  StageStatus,
  StorageReport,
  ValidationReport,
} from "../pipeline/types.js";
import type { EntityIndex } from "../retrieval/types.js";

/**
 * Constructor options for {@link IngestionOrchestrator}
 */
export interface IngestionOrchestratorOptions {
  /** Builds the pipeline for each format; its graph serves stats and clear */
  factory: PipelineFactory;
  /** Where documents are kept for polling by id */
  documents: DocumentStore;
  /** Written after a successful run; omitted means no indexing */
  entityIndex?: EntityIndex;
  /** Default deadline per run */
  timeoutMs?: number;
  /** @default true */
  indexingEnabled?: boolean;
}

/**
 * Per-call options for {@link IngestionOrchestrator.process}
 */
export interface ProcessOptions {
  /** Run this pipeline kind instead of the one selected by format */
  pipeline?: PipelineKind;
  /** Overrides the orchestrator's default deadline */
  timeoutMs?: number;
  /** Cancels the run and any retry backoff */
  signal?: AbortSignal;
  /** Receives every pipeline progress event tagged with the document id */
  onProgress?: (event: ProgressEvent & { documentId: string }) => void;
}

export interface StageSummary {
  name: string;
  status: StageStatus;
  durationMs: number;
  error?: string;
}

/**
 * Everything a caller needs to explain a run without reading logs
 */
export interface IngestionSummary {
  status: "completed" | "failed";
  /** Snapshot taken after the run finished */
  document: DocumentSnapshot;
  /** Counts over the final entities and relations */
  extraction: {
    entities: number;
    relations: number;
    entitiesByType: Record<string, number>;
    relationsByType: Record<string, number>;
    mentions: number;
    chunks: number;
  };
  /** Storage report without its stats, which are lifted to `graphStats` */
  storage: Omit<StorageReport, "graphStats"> | null;
  graphStats: GraphStats | null;
  validation: ValidationReport | null;
  pipeline: {
    name: string;
    durationMs: number;
    timedOut: boolean;
    failedStage: string | null;
    stages: StageSummary[];
    errors: string[];
  };
  /** Best-effort entity indexing; a failure here leaves `status` unchanged */
  indexing: {
    attempted: boolean;
    indexed: number;
    error?: string;
  };
}
