/**
 * Visualize Command - print a bounded sample of nodes and edges
 */

/* eslint-disable no-console */

import { createVisualizationTable } from "../output/formatters.js";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { VisualizeCommandOptions } from "../utils/validation.js";

/**
 * With `--json` the output is `{nodes, edges}`, ready for a graph viewer
 */
export async function visualizeCommand(
  options: VisualizeCommandOptions,
  deps: CliDependencies
): Promise<void> {
  const graph = await deps.orchestrator.visualize(options.limit);
  if (options.json) {
    console.log(JSON.stringify(graph, null, 2));
    return;
  }
  console.log(createVisualizationTable(graph));
}
