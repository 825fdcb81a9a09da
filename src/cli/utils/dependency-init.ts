/**
 * Dependency Initialization for CLI
 *
 * Builds the collaborators, factory and orchestrator from environment
 * configuration. OpenAI-backed services are created only when an API key is
 * configured; without one the stages that need them are skipped.
 */

import type { Logger } from "pino";
import { loadIngestionConfig, type IngestionConfig } from "../../config/index.js";
import { InMemoryDocumentStore } from "../../documents/DocumentStore.js";
import { DecoderRegistry } from "../../documents/decoders/DecoderRegistry.js";
import { LlmExtractionAgent } from "../../extraction/LlmExtractionAgent.js";
import { LlmNerService } from "../../extraction/LlmNerService.js";
import { OpenAIChatClient } from "../../extraction/OpenAIChatClient.js";
import type { ExtractionAgent, NerService } from "../../extraction/types.js";
import { Neo4jGraphGateway, type CypherDriverFactory } from "../../graph/Neo4jGraphGateway.js";
import { getComponentLogger, initializeLogger, isLoggerInitialized } from "../../logging/index.js";
import { PipelineFactory } from "../../pipeline/PipelineFactory.js";
import { OpenAIEmbeddingProvider } from "../../providers/openai-embedding.js";
import type { EmbeddingProvider } from "../../providers/types.js";
import { ChromaEntityIndex } from "../../retrieval/ChromaEntityIndex.js";
import type { EntityIndex } from "../../retrieval/types.js";
import { IngestionOrchestrator } from "../../services/ingestion-orchestrator.js";

/**
 * All dependencies required by CLI commands
 */
export interface CliDependencies {
  config: IngestionConfig;
  /** Connected by {@link initializeDependencies} unless `connect` is false */
  graph: Neo4jGraphGateway;
  factory: PipelineFactory;
  orchestrator: IngestionOrchestrator;
  /** Present only when OPENAI_API_KEY is set, as are the agent and NER service */
  embeddingProvider?: EmbeddingProvider;
  extractionAgent?: ExtractionAgent;
  nerService?: NerService;
  /** Absent when indexing is disabled or no embedding provider exists */
  entityIndex?: EntityIndex;
  logger: Logger;
}

/**
 * Overrides applied while wiring collaborators
 */
export interface BuildOptions {
  /** Overrides PIPELINE_STRICT_VALIDATION */
  strictValidation?: boolean;
  /** Neo4j driver factory; tests pass an in-memory one */
  driverFactory?: CypherDriverFactory;
}

export interface InitializeOptions extends BuildOptions {
  /** @default true */
  connect?: boolean;
}

/**
 * Wire every collaborator without touching the network
 *
 * @param config - Loaded configuration
 * @param options - Strict validation and driver overrides
 * @returns Collaborators, factory and orchestrator sharing one graph gateway
 */
export function buildDependencies(config: IngestionConfig, options: BuildOptions = {}): CliDependencies {
  const logger = getComponentLogger("cli");

  const graph = new Neo4jGraphGateway(config.neo4j, {
    retry: config.retry,
    driverFactory: options.driverFactory,
  });

  let embeddingProvider: EmbeddingProvider | undefined;
  let extractionAgent: ExtractionAgent | undefined;
  let nerService: NerService | undefined;
  if (config.openai) {
    embeddingProvider = new OpenAIEmbeddingProvider({
      provider: "openai",
      model: config.openai.embeddingModel,
      dimensions: config.openai.embeddingDimensions,
      batchSize: 100,
      maxRetries: config.retry.maxRetries,
      timeoutMs: 30000,
      apiKey: config.openai.apiKey,
    });
    const chat = new OpenAIChatClient({
      apiKey: config.openai.apiKey,
      model: config.openai.chatModel,
      retry: config.retry,
    });
    extractionAgent = new LlmExtractionAgent(chat);
    nerService = new LlmNerService(chat);
    logger.debug(
      {
        embeddingModel: embeddingProvider.modelId,
        dimensions: embeddingProvider.dimensions,
        chatModel: chat.model,
      },
      "OpenAI services initialized"
    );
  } else {
    logger.info("OPENAI_API_KEY not set; embedding, NER and extraction stages will be skipped");
  }

  const entityIndex =
    embeddingProvider && config.entityIndex.enabled
      ? new ChromaEntityIndex(
          { url: config.entityIndex.url, collection: config.entityIndex.collection },
          embeddingProvider
        )
      : undefined;

  const factory = new PipelineFactory(
    {
      decoders: DecoderRegistry.withDefaults(),
      graph,
      extractionAgent,
      embeddingProvider,
      nerService,
    },
    {
      chunkSize: config.pipeline.chunkSize,
      chunkOverlap: config.pipeline.chunkOverlap,
      extractionBatchSize: config.pipeline.extractionBatchSize,
      strictValidation: options.strictValidation ?? config.pipeline.strictValidation,
    }
  );

  const orchestrator = new IngestionOrchestrator({
    factory,
    documents: new InMemoryDocumentStore(),
    entityIndex,
    timeoutMs: config.pipeline.timeoutMs,
    indexingEnabled: config.entityIndex.enabled,
  });

  return {
    config,
    graph,
    factory,
    orchestrator,
    embeddingProvider,
    extractionAgent,
    nerService,
    entityIndex,
    logger,
  };
}

/**
 * Load configuration, start logging and (unless `connect` is false) connect to Neo4j
 *
 * The CLI logs at `warn` unless LOG_LEVEL is set.
 *
 * @throws {ConfigurationError} If an environment variable is invalid
 * @throws {GraphConnectionError} If Neo4j cannot be reached
 */
export async function initializeDependencies(options: InitializeOptions = {}): Promise<CliDependencies> {
  const config = loadIngestionConfig();
  if (!isLoggerInitialized()) {
    initializeLogger({
      level: process.env["LOG_LEVEL"] ? config.logLevel : "warn",
      format: config.logFormat,
    });
  }

  const deps = buildDependencies(config, options);
  if (options.connect ?? true) {
    await deps.graph.connect();
  }
  deps.logger.debug({ uri: config.neo4j.uri }, "CLI dependencies initialized");
  return deps;
}
