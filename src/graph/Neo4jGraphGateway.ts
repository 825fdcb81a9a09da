/**
 * Neo4j implementation of the graph gateway
 *
 * Entities become nodes labelled by entity type and keyed by `name`;
 * relations become typed edges between nodes matched by name (and label,
 * when the relation carries endpoint types). Writes are batched with
 * `UNWIND`, one statement per label or per edge shape.
 *
 * @module graph/Neo4jGraphGateway
 */

import neo4j from "neo4j-driver";
import type pino from "pino";
import type { Neo4jConnectionConfig } from "../config/ingestion-config.js";
import { getComponentLogger } from "../logging/index.js";
import {
  withRetry,
  createRetryOptions,
  createRetryLogger,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
} from "../utils/retry.js";
import {
  GraphAuthenticationError,
  GraphConnectionError,
  GraphError,
  InvalidGraphIdentifierError,
  isRetryableGraphError,
  mapNeo4jError,
} from "./errors.js";
import type {
  Entity,
  GraphGateway,
  GraphStats,
  GraphVisualization,
  PropertyValue,
  Properties,
  Relation,
} from "./types.js";

/**
 * One result row
 */
export interface CypherRow {
  get(key: string): unknown;
}

/**
 * Session used for a single statement, closed after every call
 */
export interface CypherSession {
  run(cypher: string, params: Record<string, unknown>): Promise<{ records: CypherRow[] }>;
  close(): Promise<void>;
}

/**
 * The part of a Neo4j driver the gateway uses
 */
export interface CypherDriver {
  session(): CypherSession;
  verifyConnectivity(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Creates the driver on {@link Neo4jGraphGateway.connect}; tests pass a fake
 */
export type CypherDriverFactory = (config: Neo4jConnectionConfig) => CypherDriver;

/**
 * Wrap a real neo4j-driver `Driver`
 *
 * @throws {GraphConnectionError} when no password is configured
 */
export const createNeo4jDriver: CypherDriverFactory = (config) => {
  if (!config.password) {
    throw new GraphConnectionError("NEO4J_PASSWORD is not set", undefined, false);
  }
  const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
    maxConnectionPoolSize: 50,
    connectionAcquisitionTimeout: 30000,
    maxTransactionRetryTime: 30000,
  });

  return {
    session: () => {
      const session = driver.session(config.database ? { database: config.database } : {});
      return {
        run: async (cypher, params) => {
          const result = await session.run(cypher, params);
          return { records: result.records.map((record) => ({ get: (key) => record.get(key) })) };
        },
        close: () => session.close(),
      };
    },
    verifyConnectivity: async () => {
      await driver.verifyConnectivity();
    },
    close: () => driver.close(),
  };
};

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Labels and relationship types are interpolated into Cypher, so only plain
 * identifiers are accepted
 *
 * @throws {InvalidGraphIdentifierError} for anything else
 */
function validateIdentifier(kind: "label" | "relationship type", value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new InvalidGraphIdentifierError(kind, value);
  }
  return value;
}

/**
 * Neo4j values back to plain JavaScript
 */
function fromNeo4j(value: unknown): unknown {
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  if (Array.isArray(value)) {
    return value.map(fromNeo4j);
  }
  if (typeof value === "object" && value !== null) {
    const converted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      converted[key] = fromNeo4j(inner);
    }
    return converted;
  }
  return value;
}

/** Integer column as a number; 0 for anything unexpected */
function toCount(value: unknown): number {
  const converted = fromNeo4j(value);
  return typeof converted === "number" ? converted : 0;
}

function toPlainObject(value: unknown): Record<string, unknown> {
  const converted = fromNeo4j(value);
  return typeof converted === "object" && converted !== null && !Array.isArray(converted)
    ? { ...converted }
    : {};
}

/**
 * Neo4j stores only homogeneous lists of primitives; nested lists are written
 * as JSON text
 */
function toStoredValue(value: PropertyValue): PropertyValue {
  if (Array.isArray(value) && value.some((item) => Array.isArray(item) || item === null)) {
    return JSON.stringify(value);
  }
  return value;
}

/**
 * Merge the record's properties with `extra` (confidence, source) in their
 * stored form
 */
function storedProperties(
  properties: Properties,
  extra: Record<string, PropertyValue>
): Properties {
  const stored: Properties = {};
  for (const [key, value] of Object.entries({ ...properties, ...extra })) {
    stored[key] = toStoredValue(value);
  }
  return stored;
}

/**
 * Connectivity failures other than bad credentials surface as connection errors
 */
function toConnectionError(error: GraphError, uri: string): GraphError {
  if (error instanceof GraphAuthenticationError || error instanceof GraphConnectionError) {
    return error;
  }
  const reason = error.cause?.message ?? error.message;
  return new GraphConnectionError(`Failed to connect to Neo4j at ${uri}: ${reason}`, error.cause, error.retryable);
}

/**
 * Graph gateway backed by Neo4j
 *
 * Every statement runs in its own session and is retried with backoff while
 * the mapped error is retryable.
 *
 * @example
 * ```typescript
 * const gateway = new Neo4jGraphGateway(config.neo4j, { retry: config.retry });
 * await gateway.connect();
 * try {
 *   await gateway.upsertEntities(entities);
 *   console.log(await gateway.stats());
 * } finally {
 *   await gateway.disconnect();
 * }
 * ```
 */
export class Neo4jGraphGateway implements GraphGateway {
  private driver: CypherDriver | null = null;
  private readonly retryConfig: RetryConfig;
  private readonly driverFactory: CypherDriverFactory;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - URI, credentials and optional database name
   * @param options - Retry configuration and a driver factory override
   */
  constructor(
    private readonly config: Neo4jConnectionConfig,
    options: { retry?: RetryConfig; driverFactory?: CypherDriverFactory } = {}
  ) {
    this.retryConfig = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.driverFactory = options.driverFactory ?? createNeo4jDriver;
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("graph:neo4j");
    }
    return this._logger;
  }

  private async withRetryWrapper<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const options = createRetryOptions(this.retryConfig, {
      shouldRetry: (error) => isRetryableGraphError(error),
      onRetry: createRetryLogger(this.logger, operationName, this.retryConfig.maxRetries),
    });
    return withRetry(operation, options);
  }

  /**
   * Create the driver and verify the server answers
   *
   * @throws {GraphConnectionError} when the server cannot be reached after retries
   */
  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }
    const startTime = Date.now();
    this.logger.info({ uri: this.config.uri }, "Connecting to Neo4j");

    const driver = this.driverFactory(this.config);
    try {
      await this.withRetryWrapper(async () => {
        try {
          await driver.verifyConnectivity();
        } catch (error) {
          throw toConnectionError(mapNeo4jError(error), this.config.uri);
        }
      }, "Neo4j connection");
    } catch (error) {
      this.logger.error(
        { metric: "neo4j.connection_ms", value: Date.now() - startTime, err: error },
        "Failed to connect to Neo4j"
      );
      await driver.close().catch((closeError: unknown) => {
        this.logger.debug({ err: closeError }, "Error closing driver after failed connect");
      });
      if (error instanceof GraphError) {
        throw error;
      }
      throw new GraphConnectionError(
        `Failed to connect to Neo4j at ${this.config.uri}`,
        error instanceof Error ? error : undefined
      );
    }

    this.driver = driver;
    this.logger.info(
      { metric: "neo4j.connection_ms", value: Date.now() - startTime, uri: this.config.uri },
      "Connected to Neo4j"
    );
  }

  /**
   * Close the driver; a no-op when not connected
   */
  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }
    const driver = this.driver;
    this.driver = null;
    await driver.close();
    this.logger.info("Disconnected from Neo4j");
  }

  /**
   * Never throws; false when not connected or the server does not answer
   */
  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      this.logger.warn("Health check: Driver not connected");
      return false;
    }
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error) {
      this.logger.error({ err: error }, "Health check failed");
      return false;
    }
  }

  /**
   * MERGE each entity by `(label, name)` and overwrite the supplied properties
   *
   * @param entities - Entities to write; their types become node labels
   * @returns Element ids in the same order as `entities`
   * @throws {InvalidGraphIdentifierError} for an entity type that is not a plain identifier
   * @throws {GraphError} when a statement fails after retries
   */
  async upsertEntities(entities: readonly Entity[]): Promise<string[]> {
    if (entities.length === 0) {
      return [];
    }

    const ids: string[] = new Array<string>(entities.length).fill("");
    const byLabel = new Map<string, Array<{ idx: number; name: string; props: Properties }>>();

    entities.forEach((entity, idx) => {
      const label = validateIdentifier("label", entity.type);
      const rows = byLabel.get(label) ?? [];
      rows.push({
        idx,
        name: entity.name,
        props: storedProperties(entity.properties, {
          confidence: entity.confidence,
          ...(entity.source !== undefined && { source: entity.source }),
        }),
      });
      byLabel.set(label, rows);
    });

    for (const [label, rows] of byLabel) {
      const cypher = `UNWIND $rows AS row
MERGE (n:${label} {name: row.name})
SET n += row.props
RETURN row.idx AS idx, elementId(n) AS id`;
      const records = await this.run(cypher, { rows }, `upsert ${label} nodes`);
      for (const record of records) {
        const idx = toCount(record.get("idx"));
        ids[idx] = String(record.get("id"));
      }
    }

    this.logger.debug({ entities: entities.length, labels: byLabel.size }, "Entities upserted");
    return ids;
  }

  /**
   * MERGE one typed edge per relation between endpoints matched by name
   * (and label when known). Relations whose endpoints are missing create
   * nothing and return no id.
   *
   * @param relations - Relations to write
   * @returns Element ids of the edges written, grouped by edge shape
   */
  async upsertRelations(relations: readonly Relation[]): Promise<string[]> {
    if (relations.length === 0) {
      return [];
    }

    const groups = new Map<
      string,
      { cypher: string; rows: Array<{ from: string; to: string; props: Properties }> }
    >();

    for (const relation of relations) {
      const type = validateIdentifier("relationship type", relation.type);
      const fromLabel = relation.fromEntityType
        ? `:${validateIdentifier("label", relation.fromEntityType)}`
        : "";
      const toLabel = relation.toEntityType
        ? `:${validateIdentifier("label", relation.toEntityType)}`
        : "";
      const shape = `${fromLabel}|${type}|${toLabel}`;

      let group = groups.get(shape);
      if (!group) {
        group = {
          cypher: `UNWIND $rows AS row
MATCH (a${fromLabel} {name: row.from})
MATCH (b${toLabel} {name: row.to})
MERGE (a)-[r:${type}]->(b)
SET r += row.props
RETURN elementId(r) AS id`,
          rows: [],
        };
        groups.set(shape, group);
      }
      group.rows.push({
        from: relation.fromEntity,
        to: relation.toEntity,
        props: storedProperties(relation.properties, {
          confidence: relation.confidence,
          ...(relation.source !== undefined && { source: relation.source }),
        }),
      });
    }

    const ids: string[] = [];
    for (const [shape, group] of groups) {
      const records = await this.run(group.cypher, { rows: group.rows }, `upsert ${shape} edges`);
      ids.push(...records.map((record) => String(record.get("id"))));
    }

    if (ids.length < relations.length) {
      this.logger.warn(
        { relations: relations.length, stored: ids.length },
        "Some relations were not stored because an endpoint was not found"
      );
    }
    return ids;
  }

  /**
   * Count nodes and relationships, in total and per label or type
   */
  async stats(): Promise<GraphStats> {
    const [nodes] = await this.run("MATCH (n) RETURN count(n) AS count", {}, "count nodes");
    const [edges] = await this.run(
      "MATCH ()-[r]->() RETURN count(r) AS count",
      {},
      "count relationships"
    );
    const labels = await this.run(
      "MATCH (n) UNWIND labels(n) AS label RETURN label, count(*) AS count ORDER BY label",
      {},
      "count by label"
    );
    const types = await this.run(
      "MATCH ()-[r]->() RETURN type(r) AS type, count(*) AS count ORDER BY type",
      {},
      "count by type"
    );

    const byLabel: Record<string, number> = {};
    for (const record of labels) {
      byLabel[String(record.get("label"))] = toCount(record.get("count"));
    }
    const byType: Record<string, number> = {};
    for (const record of types) {
      byType[String(record.get("type"))] = toCount(record.get("count"));
    }

    return {
      totalNodes: nodes ? toCount(nodes.get("count")) : 0,
      totalRelationships: edges ? toCount(edges.get("count")) : 0,
      byLabel,
      byType,
    };
  }

  /**
   * Up to `limit` nodes and the edges among them
   *
   * @param limit - Node cap; values below 1 are raised to 1
   */
  async visualize(limit: number): Promise<GraphVisualization> {
    const safeLimit = Math.max(1, Math.floor(limit));
    const nodeRecords = await this.run(
      "MATCH (n) RETURN elementId(n) AS id, labels(n) AS labels, properties(n) AS props LIMIT $limit",
      { limit: neo4j.int(safeLimit) },
      "visualize nodes"
    );

    const nodes = nodeRecords.map((record) => {
      const properties = toPlainObject(record.get("props"));
      const labels = fromNeo4j(record.get("labels"));
      const label = Array.isArray(labels) && typeof labels[0] === "string" ? labels[0] : "Node";
      return {
        id: String(record.get("id")),
        label,
        name: typeof properties["name"] === "string" ? properties["name"] : "",
        properties,
      };
    });

    if (nodes.length === 0) {
      return { nodes: [], edges: [] };
    }

    const edgeRecords = await this.run(
      `MATCH (a)-[r]->(b)
WHERE elementId(a) IN $ids AND elementId(b) IN $ids
RETURN elementId(r) AS id, type(r) AS type, elementId(a) AS source, elementId(b) AS target, properties(r) AS props`,
      { ids: nodes.map((node) => node.id) },
      "visualize edges"
    );

    return {
      nodes,
      edges: edgeRecords.map((record) => ({
        id: String(record.get("id")),
        type: String(record.get("type")),
        source: String(record.get("source")),
        target: String(record.get("target")),
        properties: toPlainObject(record.get("props")),
      })),
    };
  }

  /** DETACH DELETE every node */
  async clear(): Promise<void> {
    await this.run("MATCH (n) DETACH DELETE n", {}, "clear graph");
    this.logger.info("Graph cleared");
  }

  /**
   * Run one statement with retries and timing
   *
   * @throws {GraphConnectionError} when {@link connect} has not been called
   */
  private async run(
    cypher: string,
    params: Record<string, unknown>,
    operationName: string
  ): Promise<CypherRow[]> {
    if (!this.driver) {
      throw new GraphConnectionError("Not connected to Neo4j. Call connect() first.", undefined, false);
    }
    const driver = this.driver;
    const startTime = Date.now();

    try {
      const records = await this.withRetryWrapper(async () => {
        const session = driver.session();
        try {
          const result = await session.run(cypher, params);
          return result.records;
        } catch (error) {
          throw mapNeo4jError(error, cypher);
        } finally {
          await session.close();
        }
      }, operationName);

      this.logger.debug(
        { metric: "neo4j.query_ms", value: Date.now() - startTime, operation: operationName, recordCount: records.length },
        "Query executed"
      );
      return records;
    } catch (error) {
      this.logger.error(
        { metric: "neo4j.query_ms", value: Date.now() - startTime, operation: operationName, err: error },
        "Query failed"
      );
      throw mapNeo4jError(error, cypher);
    }
  }
}
