/**
 * Clear Command - delete every node and relationship
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import { confirm } from "../utils/prompts.js";
import type { ClearCommandOptions } from "../utils/validation.js";

/**
 * Execute clear command
 *
 * Asks for confirmation unless `--force` is given. An empty graph is
 * reported without prompting.
 *
 * @param options - Validated command options
 * @param deps - Initialized CLI dependencies
 * @param ask - Confirmation prompt; replaced in tests
 */
export async function clearCommand(
  options: ClearCommandOptions,
  deps: CliDependencies,
  ask: (message: string) => Promise<boolean> = confirm
): Promise<void> {
  const stats = await deps.orchestrator.graphStats();
  if (stats.totalNodes === 0) {
    console.log(chalk.yellow("The graph is already empty."));
    return;
  }

  if (!options.force) {
    const confirmed = await ask(
      `Delete ${stats.totalNodes} nodes and ${stats.totalRelationships} relationships? (y/N)`
    );
    if (!confirmed) {
      console.log(chalk.gray("Cancelled."));
      return;
    }
  }

  await deps.orchestrator.clearGraph();
  console.log(
    chalk.green(`✓ Deleted ${stats.totalNodes} nodes and ${stats.totalRelationships} relationships`)
  );
}
