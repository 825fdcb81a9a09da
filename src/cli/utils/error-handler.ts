/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps service errors to user-friendly messages with actionable next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { Ora } from "ora";
import { ZodError } from "zod";
import { ConfigurationError } from "../../config/index.js";
import { DOCUMENT_FORMATS } from "../../documents/types.js";
import {
  DecodeError,
  DocumentError,
  FileAccessError,
  UnsupportedFormatError,
} from "../../documents/errors.js";
import { GraphAuthenticationError, GraphConnectionError } from "../../graph/errors.js";
import { CollaboratorError, PipelineConfigurationError } from "../../pipeline/errors.js";

const CLI = "kg-ingest";

/** Print a bulleted "Next steps" block */
function nextSteps(...steps: string[]): void {
  console.error("\n" + chalk.bold("Next steps:"));
  for (const step of steps) {
    console.error(`  • ${step}`);
  }
}

function verboseHint(command: string): string {
  return "Enable verbose logging: " + chalk.gray(`LOG_LEVEL=debug ${CLI} ${command}`);
}

/**
 * One-line description of an error for command output, e.g.
 * `Invalid option "limit": Number must be less than or equal to 1000`
 *
 * @param error - Any caught value; zod errors name their first failing option
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => {
        const path = issue.path.join(".");
        return path ? `Invalid option "${path}": ${issue.message}` : issue.message;
      })
      .join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle command errors and exit with appropriate status code
 *
 * Stops any active spinner, prints a formatted message to stderr and exits
 * the process with code 1.
 *
 * @param error - Error thrown by a command
 * @param spinner - Active spinner to stop before printing
 */
export function handleCommandError(error: unknown, spinner?: Ora): never {
  if (spinner && spinner.isSpinning) {
    spinner.stop();
  }

  console.error();

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Command Options"));
    console.error(`\n${describeError(error)}`);
    nextSteps("Show usage: " + chalk.gray(`${CLI} <command> --help`));
    process.exit(1);
  }

  if (error instanceof ConfigurationError) {
    console.error(chalk.red("✗ Configuration Error"));
    console.error(`\n${error.message}`);
    nextSteps(
      `Check ${error.variable ? chalk.cyan(error.variable) : "your settings"} in the .env file`,
      "Compare with " + chalk.gray(".env.example")
    );
    process.exit(1);
  }

  if (error instanceof UnsupportedFormatError) {
    console.error(chalk.red("✗ Unsupported Format"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Supported formats:"));
    console.error("  " + DOCUMENT_FORMATS.join(", "));
    nextSteps("List formats and their pipelines: " + chalk.gray(`${CLI} formats`));
    process.exit(1);
  }

  if (error instanceof FileAccessError) {
    console.error(chalk.red("✗ File Not Accessible"));
    console.error(`\n${error.message}`);
    nextSteps("Verify the path exists and is a readable file");
    process.exit(1);
  }

  if (error instanceof DecodeError || error instanceof DocumentError) {
    console.error(chalk.red("✗ Document Error"));
    console.error(`\n${error.message}`);
    nextSteps("Check that the file content matches the declared --format", verboseHint("ingest <file>"));
    process.exit(1);
  }

  if (error instanceof GraphAuthenticationError) {
    console.error(chalk.red("✗ Neo4j Authentication Failed"));
    console.error(`\n${error.message}`);
    nextSteps("Check " + chalk.cyan("NEO4J_USER") + " and " + chalk.cyan("NEO4J_PASSWORD") + " in .env");
    process.exit(1);
  }

  if (error instanceof GraphConnectionError) {
    console.error(chalk.red("✗ Neo4j Connection Error"));
    console.error(`\n${error.message}`);
    nextSteps(
      "Verify Neo4j is running: " + chalk.gray("docker compose up -d neo4j"),
      "Check " + chalk.cyan("NEO4J_URI") + " and " + chalk.cyan("NEO4J_PASSWORD") + " in .env"
    );
    process.exit(1);
  }

  if (error instanceof CollaboratorError) {
    console.error(chalk.red(`✗ ${error.collaborator} Service Error`));
    console.error(`\n${error.message}`);
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    nextSteps(verboseHint("<command>"));
    process.exit(1);
  }

  if (error instanceof PipelineConfigurationError) {
    console.error(chalk.red("✗ Pipeline Configuration Error"));
    console.error(`\n${error.message}`);
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    const level = process.env["LOG_LEVEL"];
    if (level === "debug" || level === "trace") {
      console.error("\n" + chalk.gray(error.stack || "No stack trace available"));
    }

    nextSteps(verboseHint("<command>"), "Check configuration in .env file");
    process.exit(1);
  }

  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  nextSteps(verboseHint("<command>"));
  process.exit(1);
}
