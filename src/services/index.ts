/**
 * Ingestion services
 *
 * @module services
 */

export { IngestionOrchestrator } from "./ingestion-orchestrator.js";
export type {
  IngestionOrchestratorOptions,
  IngestionSummary,
  ProcessOptions,
  StageSummary,
} from "./ingestion-types.js";
