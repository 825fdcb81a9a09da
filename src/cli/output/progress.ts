/**
 * Progress Indicators for CLI
 *
 * Spinner wiring for the ingest command.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { ProgressEvent } from "../../pipeline/types.js";

const STAGE_LABELS: Record<string, string> = {
  Parsing: "Parsing document",
  Chunking: "Splitting text into chunks",
  Embedding: "Generating embeddings",
  NER: "Recognizing named entities",
  Extraction: "Extracting entities and relations",
  Transformation: "Transforming graph data",
  Enrichment: "Enriching entities",
  Validation: "Validating graph data",
  Storage: "Writing to Neo4j",
};

/**
 * Create a spinner for an ingest run
 */
export function createIngestSpinner(filename: string): Ora {
  return ora({
    text: `Ingesting ${chalk.cyan(filename)}...`,
    color: "cyan",
  }).start();
}

/**
 * Spinner text for a progress event, e.g.
 * `[3/9 22%] Generating embeddings...`
 *
 * @param event - Event emitted before a stage runs
 * @returns Position, rounded percentage and stage label
 */
export function progressText(event: ProgressEvent): string {
  const label = STAGE_LABELS[event.stage] ?? event.stage;
  return `[${event.index + 1}/${event.total} ${Math.round(event.progress)}%] ${label}...`;
}

export function updateIngestSpinner(spinner: Ora, event: ProgressEvent): void {
  spinner.text = progressText(event);
}
