/**
 * kg-ingest CLI
 *
 * - ingest: Run a file through the pipeline for its format
 * - stats: Node and relationship counts
 * - visualize: Sample of nodes and edges
 * - clear: Delete the whole graph
 * - formats: Supported formats and their pipelines
 * - health: Check Neo4j and OpenAI
 */

import { Command } from "commander";
import { initializeDependencies, type CliDependencies, type InitializeOptions } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { ingestCommand } from "./commands/ingest-command.js";
import { statsCommand } from "./commands/stats-command.js";
import { visualizeCommand } from "./commands/visualize-command.js";
import { clearCommand } from "./commands/clear-command.js";
import { formatsCommand } from "./commands/formats-command.js";
import { healthCommand } from "./commands/health-command.js";
import {
  IngestCommandOptionsSchema,
  StatsCommandOptionsSchema,
  VisualizeCommandOptionsSchema,
  ClearCommandOptionsSchema,
} from "./utils/validation.js";

/**
 * Initialize dependencies, run `action`, and always release the Neo4j driver
 */
async function withDependencies(
  options: InitializeOptions,
  action: (deps: CliDependencies) => Promise<void>
): Promise<void> {
  const deps = await initializeDependencies(options);
  try {
    await action(deps);
  } finally {
    await deps.graph.disconnect();
  }
}

/**
 * Build the commander program with every subcommand registered
 *
 * Option values are validated with zod before a command runs; validation
 * and command errors go through {@link handleCommandError}.
 *
 * @returns Program ready for `parseAsync(process.argv)`
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("kg-ingest")
    .description("Ingest documents into a Neo4j knowledge graph")
    .version("0.1.0");

  program
    .command("ingest")
    .description("Extract entities and relations from a file and store them in the graph")
    .argument("<file>", "File to ingest")
    .option("-f, --format <format>", "Document format (csv, tsv, json, txt, markdown, pdf); detected from the extension when omitted")
    .option("-p, --pipeline <kind>", "Pipeline to run instead of the format's default (default, free-text, tabular, minimal)")
    .option("--strict", "Fail the run when validation finds errors")
    .option("-t, --timeout <ms>", "Deadline for the whole run in milliseconds")
    .option("--json", "Output as JSON")
    .action(async (file: string, options: Record<string, unknown>) => {
      try {
        const validatedOptions = IngestCommandOptionsSchema.parse(options);
        await withDependencies({ strictValidation: validatedOptions.strict }, (deps) =>
          ingestCommand(file, validatedOptions, deps)
        );
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("stats")
    .description("Show node and relationship counts")
    .option("--json", "Output as JSON")
    .action(async (options: Record<string, unknown>) => {
      try {
        const validatedOptions = StatsCommandOptionsSchema.parse(options);
        await withDependencies({}, (deps) => statsCommand(validatedOptions, deps));
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("visualize")
    .description("Print a sample of the graph")
    .option("-l, --limit <number>", "Maximum nodes (1-1000)", "100")
    .option("--json", "Output as JSON")
    .action(async (options: Record<string, unknown>) => {
      try {
        const validatedOptions = VisualizeCommandOptionsSchema.parse(options);
        await withDependencies({}, (deps) => visualizeCommand(validatedOptions, deps));
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("clear")
    .description("Delete every node and relationship")
    .option("-f, --force", "Skip confirmation prompt")
    .action(async (options: Record<string, unknown>) => {
      try {
        const validatedOptions = ClearCommandOptionsSchema.parse(options);
        await withDependencies({}, (deps) => clearCommand(validatedOptions, deps));
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("formats")
    .description("List supported formats and the pipeline each selects")
    .action(async () => {
      try {
        const deps = await initializeDependencies({ connect: false });
        formatsCommand(deps.factory);
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("health")
    .description("Check health of Neo4j and the OpenAI API")
    .action(async () => {
      try {
        await withDependencies({ connect: false }, healthCommand);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return program;
}
