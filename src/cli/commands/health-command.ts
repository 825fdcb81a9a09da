/**
 * Health Command - Check service health status
 *
 * Verifies that Neo4j and, when configured, the OpenAI API answer.
 */

/* eslint-disable no-console */

import { performance } from "node:perf_hooks";
import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";

/**
 * Health check result for a single service
 */
export interface HealthCheckResult {
  name: string;
  /** undefined when the service is not configured */
  healthy: boolean | undefined;
  durationMs: number;
  error?: string;
}

/** Run one check, timing it and turning a throw into an unhealthy result */
async function timed(name: string, check: () => Promise<boolean>): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    const healthy = await check();
    return { name, healthy, durationMs: performance.now() - start };
  } catch (error) {
    return {
      name,
      healthy: false,
      durationMs: performance.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Run every check; services that are not configured are reported, not failed
 */
export async function runHealthChecks(deps: CliDependencies): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];

  results.push(
    await timed("Neo4j", async () => {
      await deps.graph.connect();
      return deps.graph.healthCheck();
    })
  );

  const provider = deps.embeddingProvider;
  if (provider) {
    // One small embedding request
    results.push(await timed("OpenAI API", () => provider.healthCheck()));
  } else {
    results.push({ name: "OpenAI API", healthy: undefined, durationMs: 0 });
  }

  return results;
}

/**
 * Execute health command
 *
 * Exit code 0 if every configured service is healthy, 1 otherwise.
 */
export async function healthCommand(deps: CliDependencies): Promise<void> {
  console.log(chalk.bold("\nHealth Check Results\n"));

  const results = await runHealthChecks(deps);

  for (const result of results) {
    if (result.healthy === undefined) {
      console.log(`${chalk.gray("-")} ${result.name.padEnd(20)} ${chalk.gray("not configured")}`);
      continue;
    }
    const status = result.healthy ? chalk.green("✓") : chalk.red("✗");
    const duration = chalk.gray(`(${Math.round(result.durationMs)}ms)`);
    const healthStatus = result.healthy ? chalk.green("healthy") : chalk.red("unhealthy");

    console.log(`${status} ${result.name.padEnd(20)} ${healthStatus.padEnd(20)} ${duration}`);

    if (result.error) {
      console.log(chalk.gray(`  Error: ${result.error}`));
    }
  }

  console.log();

  if (results.every((result) => result.healthy !== false)) {
    console.log(chalk.green("✓ All configured services operational."));
    return;
  }

  console.log(chalk.red("✗ Some services are unhealthy."));
  console.log("\n" + chalk.bold("Next steps:"));
  console.log("  • Verify Neo4j is running: " + chalk.gray("docker compose up -d neo4j"));
  console.log("  • Check NEO4J_URI and NEO4J_PASSWORD in .env");
  console.log("  • Check OPENAI_API_KEY in .env");
  process.exitCode = 1;
}
