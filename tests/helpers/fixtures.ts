/**
 * Paths of the sample documents under tests/fixtures/ingest
 */

import { fileURLToPath } from "node:url";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/ingest/${name}`, import.meta.url));
}
