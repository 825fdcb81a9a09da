/**
 * Ingest Command - run one file through its pipeline
 */

/* eslint-disable no-console */

import * as path from "node:path";
import chalk from "chalk";
import { detectFormat } from "../../documents/formats.js";
import { UnsupportedFormatError } from "../../documents/errors.js";
import type { IngestionSummary } from "../../services/ingestion-types.js";
import { createIngestSummary } from "../output/formatters.js";
import { createIngestSpinner, updateIngestSpinner } from "../output/progress.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import { handleCommandError } from "../utils/error-handler.js";
import type { IngestCommandOptions } from "../utils/validation.js";

/**
 * Declared format, or the one implied by the file extension
 *
 * @param filePath - File passed on the command line
 * @param declared - Value of `--format`, if given
 * @throws {UnsupportedFormatError} when neither is available
 */
export function resolveDeclaredFormat(filePath: string, declared?: string): string {
  if (declared) {
    return declared;
  }
  const detected = detectFormat(filePath);
  if (!detected) {
    throw new UnsupportedFormatError(
      `Cannot detect a format from "${path.basename(filePath)}"; pass --format`,
      path.extname(filePath)
    );
  }
  return detected;
}

/**
 * Execute ingest command
 *
 * Exits with code 1 when the run fails, so scripts can test the result.
 *
 * @param filePath - File to ingest
 * @param options - Validated command options
 * @param deps - Initialized CLI dependencies
 */
export async function ingestCommand(
  filePath: string,
  options: IngestCommandOptions,
  deps: CliDependencies
): Promise<void> {
  const format = resolveDeclaredFormat(filePath, options.format);
  const spinner = options.json ? undefined : createIngestSpinner(path.basename(filePath));

  let summary: IngestionSummary;
  try {
    summary = await deps.orchestrator.process(filePath, format, {
      pipeline: options.pipeline,
      timeoutMs: options.timeout,
      onProgress: spinner ? (event) => updateIngestSpinner(spinner, event) : undefined,
    });
  } catch (error) {
    handleCommandError(error, spinner);
  }

  if (spinner) {
    if (summary.status === "completed") {
      spinner.succeed(chalk.green("Ingestion complete"));
    } else {
      spinner.fail(chalk.red("Ingestion failed"));
    }
  }

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log("\n" + createIngestSummary(summary));
  }

  if (summary.status === "failed") {
    process.exitCode = 1;
  }
}
