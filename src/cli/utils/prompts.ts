/**
 * Interactive confirmation for destructive commands
 */

import { createInterface } from "node:readline/promises";

/**
 * Ask a yes/no question on stdin. Only "y" and "yes" (any case) confirm.
 *
 * @example
 * ```typescript
 * if (await confirm("Delete every node in the graph? (y/N)")) {
 *   await orchestrator.clearGraph();
 * }
 * ```
 */
export async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${message} `);
    return isAffirmative(answer);
  } finally {
    rl.close();
  }
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}
