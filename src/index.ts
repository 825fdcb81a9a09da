/**
 * kg-ingest library entry point
 *
 * @example
 * ```typescript
 * import {
 *   DecoderRegistry,
 *   InMemoryDocumentStore,
 *   IngestionOrchestrator,
 *   Neo4jGraphGateway,
 *   PipelineFactory,
 *   initializeLogger,
 *   loadIngestionConfig,
 * } from "kg-ingest";
 *
 * const config = loadIngestionConfig();
 * initializeLogger({ level: config.logLevel, format: "json" });
 *
 * const graph = new Neo4jGraphGateway(config.neo4j, { retry: config.retry });
 * await graph.connect();
 *
 * const factory = new PipelineFactory({ decoders: DecoderRegistry.withDefaults(), graph, extractionAgent });
 * const orchestrator = new IngestionOrchestrator({ factory, documents: new InMemoryDocumentStore() });
 * const summary = await orchestrator.process("./movies.csv", "csv");
 * ```
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./utils/retry.js";
export * from "./documents/index.js";
export * from "./ingestion/index.js";
export * from "./graph/index.js";
export * from "./providers/index.js";
export * from "./extraction/index.js";
export * from "./retrieval/index.js";
export * from "./pipeline/index.js";
export * from "./services/index.js";
