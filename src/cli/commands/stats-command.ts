/**
 * Stats Command - node and relationship counts of the graph
 */

/* eslint-disable no-console */

import { createStatsTable } from "../output/formatters.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { StatsCommandOptions } from "../utils/validation.js";

/**
 * Execute stats command
 *
 * @param options - `--json` prints the raw stats object
 */
export async function statsCommand(options: StatsCommandOptions, deps: CliDependencies): Promise<void> {
  const stats = await deps.orchestrator.graphStats();
  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  console.log(createStatsTable(stats));
}
