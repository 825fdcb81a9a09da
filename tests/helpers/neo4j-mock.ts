/**
 * Mock Neo4j driver for unit testing
 *
 * Implements the gateway's CypherDriver seam so Neo4jGraphGateway can be
 * tested without a running server. Queries are answered by a handler and
 * recorded for assertions.
 */

import type {
  CypherDriver,
  CypherRow,
  CypherSession,
} from "../../src/graph/Neo4jGraphGateway.js";

/**
 * Row backed by a plain object
 */
export class MockRecord implements CypherRow {
  constructor(private readonly data: Record<string, unknown>) {}

  get(key: string): unknown {
    return this.data[key];
  }
}

export interface RecordedQuery {
  cypher: string;
  params: Record<string, unknown>;
}

export type QueryHandler = (
  cypher: string,
  params: Record<string, unknown>
) => Array<Record<string, unknown>>;

export class MockCypherDriver implements CypherDriver {
  readonly queries: RecordedQuery[] = [];
  sessionsOpened = 0;
  sessionsClosed = 0;
  verifyCalls = 0;
  closed = false;

  /** Errors thrown by the next queries, one per query */
  queryErrors: Error[] = [];
  /** Errors thrown by the next connectivity checks; the last one repeats when `repeatVerifyError` */
  verifyErrors: Error[] = [];
  repeatVerifyError = false;

  constructor(private handler: QueryHandler = () => []) {}

  respondWith(handler: QueryHandler): void {
    this.handler = handler;
  }

  session(): CypherSession {
    this.sessionsOpened++;
    return {
      run: async (cypher, params) => {
        this.queries.push({ cypher, params });
        const error = this.queryErrors.shift();
        if (error) {
          throw error;
        }
        return { records: this.handler(cypher, params).map((row) => new MockRecord(row)) };
      },
      close: async () => {
        this.sessionsClosed++;
      },
    };
  }

  async verifyConnectivity(): Promise<void> {
    this.verifyCalls++;
    const error =
      this.repeatVerifyError && this.verifyErrors.length === 1
        ? this.verifyErrors[0]
        : this.verifyErrors.shift();
    if (error) {
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Rows a MERGE-by-name node statement would return: one per input row
 */
export function echoNodeRows(params: Record<string, unknown>): Array<Record<string, unknown>> {
  const rows = params["rows"];
  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.map((row: unknown) => {
    const idx = typeof row === "object" && row !== null ? Reflect.get(row, "idx") : undefined;
    const name = typeof row === "object" && row !== null ? Reflect.get(row, "name") : undefined;
    return { idx, id: `4:node:${String(name)}` };
  });
}
