/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import { DOCUMENT_FORMATS } from "../../documents/types.js";
import { extensionsFor } from "../../documents/formats.js";
import type { GraphStats, GraphVisualization } from "../../graph/types.js";
import { pipelineKindForFormat } from "../../pipeline/PipelineFactory.js";
import type { StageStatus, ValidationIssue } from "../../pipeline/types.js";
import type { IngestionSummary } from "../../services/ingestion-types.js";

const TABLE_STYLE = { head: [], border: ["gray"] };

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated
 *
 * @param str - String to truncate
 * @param maxLength - Maximum length including the ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (maxLength < 4) return str.substring(0, maxLength);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Format duration in milliseconds to human readable string
 *
 * @example
 * formatDuration(500) // "500ms"
 * formatDuration(2340) // "2.3s"
 * formatDuration(75000) // "1m 15s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

function stageStatusIndicator(status: StageStatus): string | undefined {
  switch (status) {
    case "completed":
      return chalk.green("✓ completed");
    case "skipped":
      return chalk.gray("- skipped");
    case "failed":
      return chalk.red("✗ failed");
  }
}

function countsTable(title: string, counts: Record<string, number>): string {
  const table = new Table({
    head: [chalk.cyan(title), chalk.cyan("Count")],
    colAligns: ["left", "right"],
    style: TABLE_STYLE,
  });
  for (const [key, count] of Object.entries(counts).sort(([a], [b]) => a.localeCompare(b))) {
    table.push([key, count.toString()]);
  }
  return table.toString();
}

function issueLine(issue: ValidationIssue): string {
  const marker = issue.severity === "error" ? chalk.red("error") : chalk.yellow("warning");
  return `  ${marker} ${chalk.gray(issue.key)} ${issue.message}`;
}

/**
 * Human-readable report of one ingest run
 *
 * Lists the document status, per-type counts, stage results, storage and
 * indexing outcome, and the first validation issues.
 *
 * @param summary - Summary returned by the orchestrator
 * @returns Multi-line text with chalk colors
 */
export function createIngestSummary(summary: IngestionSummary): string {
  const { document, extraction, pipeline } = summary;
  const lines: string[] = [];

  const headline =
    summary.status === "completed"
      ? chalk.green(`✓ Ingested ${document.filename}`)
      : chalk.red(`✗ Ingestion of ${document.filename} failed`);
  lines.push(chalk.bold(headline));
  lines.push(
    `  Document ${chalk.cyan(document.id)} · ${document.format} · pipeline ${chalk.cyan(pipeline.name)} · ${formatDuration(pipeline.durationMs)}`
  );
  if (document.error) {
    lines.push(`  ${chalk.red(document.error)}`);
  }
  if (pipeline.timedOut) {
    lines.push(`  ${chalk.yellow("Deadline exceeded")}`);
  }

  const stages = new Table({
    head: [chalk.cyan("Stage"), chalk.cyan("Status"), chalk.cyan("Duration"), chalk.cyan("Error")],
    colAligns: ["left", "left", "right", "left"],
    style: TABLE_STYLE,
  });
  for (const stage of pipeline.stages) {
    stages.push([
      stage.name,
      stageStatusIndicator(stage.status),
      formatDuration(stage.durationMs),
      stage.error ? truncate(stage.error, 60) : "",
    ]);
  }
  lines.push("", stages.toString());

  lines.push(
    "",
    `Entities: ${chalk.bold(extraction.entities.toString())}  Relations: ${chalk.bold(extraction.relations.toString())}  Chunks: ${extraction.chunks}  Mentions: ${extraction.mentions}`
  );
  if (extraction.entities > 0) {
    lines.push(countsTable("Entity type", extraction.entitiesByType));
  }
  if (extraction.relations > 0) {
    lines.push(countsTable("Relation type", extraction.relationsByType));
  }

  if (summary.storage) {
    lines.push(
      "",
      `Stored ${summary.storage.entitiesStored} entities and ${summary.storage.relationsStored} relations`
    );
  }

  const validation = summary.validation;
  if (validation && (validation.errors.length > 0 || validation.warnings.length > 0)) {
    lines.push(
      "",
      chalk.bold(`Validation: ${validation.errors.length} errors, ${validation.warnings.length} warnings`)
    );
    for (const issue of [...validation.errors, ...validation.warnings].slice(0, 20)) {
      lines.push(issueLine(issue));
    }
  }

  if (summary.indexing.error) {
    lines.push("", chalk.yellow(`Entity indexing failed: ${summary.indexing.error}`));
  } else if (summary.indexing.attempted) {
    lines.push("", `Indexed ${summary.indexing.indexed} entities for search`);
  }

  return lines.join("\n");
}

/**
 * Node and relationship counts of the graph
 */
export function createStatsTable(stats: GraphStats): string {
  if (stats.totalNodes === 0) {
    return (
      chalk.yellow("The graph is empty.") +
      "\n\n" +
      chalk.bold("Get started:") +
      "\n  " +
      chalk.gray("kg-ingest ingest <file> --format csv")
    );
  }

  const lines = [
    chalk.bold(`\nGraph: ${stats.totalNodes} nodes, ${stats.totalRelationships} relationships\n`),
    countsTable("Label", stats.byLabel),
  ];
  if (Object.keys(stats.byType).length > 0) {
    lines.push(countsTable("Relationship type", stats.byType));
  }
  return lines.join("\n");
}

/**
 * Edge list of a graph sample, one row per relationship
 */
export function createVisualizationTable(graph: GraphVisualization): string {
  if (graph.nodes.length === 0) {
    return chalk.yellow("The graph is empty.");
  }

  const names = new Map(graph.nodes.map((node) => [node.id, `${node.name} (${node.label})`]));
  const table = new Table({
    head: [chalk.cyan("From"), chalk.cyan("Relationship"), chalk.cyan("To")],
    style: TABLE_STYLE,
  });
  for (const edge of graph.edges) {
    table.push([
      truncate(names.get(edge.source) ?? edge.source, 40),
      edge.type,
      truncate(names.get(edge.target) ?? edge.target, 40),
    ]);
  }

  const connected = new Set(graph.edges.flatMap((edge) => [edge.source, edge.target]));
  const isolated = graph.nodes.filter((node) => !connected.has(node.id));

  const lines = [chalk.bold(`\n${graph.nodes.length} nodes, ${graph.edges.length} edges\n`)];
  if (graph.edges.length > 0) {
    lines.push(table.toString());
  }
  if (isolated.length > 0) {
    lines.push(
      chalk.gray(`Unconnected: ${isolated.map((node) => `${node.name} (${node.label})`).join(", ")}`)
    );
  }
  return lines.join("\n");
}

/**
 * Supported formats, their extensions and the pipeline each selects
 *
 * @param stageNames - Stage names of the pipeline built for a format
 */
export function createFormatsTable(stageNames: (format: string) => string[]): string {
  const table = new Table({
    head: [chalk.cyan("Format"), chalk.cyan("Extensions"), chalk.cyan("Pipeline"), chalk.cyan("Stages")],
    style: TABLE_STYLE,
    wordWrap: true,
    colWidths: [10, 16, 11, 60],
  });
  for (const format of DOCUMENT_FORMATS) {
    table.push([
      format,
      extensionsFor(format).join(" "),
      pipelineKindForFormat(format),
      stageNames(format).join(" → "),
    ]);
  }
  return table.toString();
}
