/**
 * Ingestion configuration
 *
 * Reads connection settings and pipeline defaults from the environment and
 * validates them with zod. Optional collaborators (OpenAI, ChromaDB) are left
 * undefined when their settings are absent so the pipeline can skip the
 * stages that need them.
 *
 * @module config/ingestion-config
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logging/types.js";
import { createRetryConfigFromEnv, type RetryConfig } from "../utils/retry.js";

/**
 * Raised when an environment variable holds an unusable value
 */
export class ConfigurationError extends Error {
  /** Environment variable holding the bad value, when known */
  readonly variable?: string;

  /**
   * @param message - Human-readable error message
   * @param variable - Name of the offending environment variable
   */
  constructor(message: string, variable?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.variable = variable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Neo4j connection settings
 */
export interface Neo4jConnectionConfig {
  /** Bolt URI (NEO4J_URI), e.g. bolt://localhost:7687 */
  uri: string;
  username: string;
  /** Required only by commands that touch the graph */
  password?: string;
  /** Database name; the server default when omitted */
  database?: string;
}

/**
 * OpenAI settings, present only when OPENAI_API_KEY is set
 */
export interface OpenAIConnectionConfig {
  apiKey: string;
  embeddingModel: string;
  embeddingDimensions: number;
  chatModel: string;
}

export interface EntityIndexConfig {
  /** ChromaDB URL (CHROMADB_URL) */
  url: string;
  /** Collection name (ENTITY_COLLECTION) */
  collection: string;
  /** ENTITY_INDEXING_ENABLED; indexing still needs an embedding provider */
  enabled: boolean;
}

export interface PipelineDefaultsConfig {
  /** Deadline for one pipeline run; undefined means no deadline */
  timeoutMs?: number;
  strictValidation: boolean;
  chunkSize: number;
  chunkOverlap: number;
  extractionBatchSize: number;
}

/**
 * Complete configuration of the ingestion CLI
 */
export interface IngestionConfig {
  logLevel: LogLevel;
  logFormat: "json" | "pretty";
  neo4j: Neo4jConnectionConfig;
  openai?: OpenAIConnectionConfig;
  entityIndex: EntityIndexConfig;
  pipeline: PipelineDefaultsConfig;
  retry: RetryConfig;
}

/**
 * Accepts true/false, 1/0 and yes/no in any case; anything else yields the default
 */
function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase().trim();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return defaultValue;
}

function parseEnvInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    return defaultValue;
  }
  return parsed;
}

const LogLevelSchema = z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);

const PipelineDefaultsSchema = z
  .object({
    timeoutMs: z.number().int().positive().optional(),
    strictValidation: z.boolean(),
    chunkSize: z.number().int().min(100).max(100_000),
    chunkOverlap: z.number().int().min(0),
    extractionBatchSize: z.number().int().min(1).max(1000),
  })
  .refine((value) => value.chunkOverlap < value.chunkSize, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["chunkOverlap"],
  });

const ENV_BY_PATH: Record<string, string> = {
  timeoutMs: "PIPELINE_TIMEOUT_MS",
  chunkSize: "CHUNK_SIZE",
  chunkOverlap: "CHUNK_OVERLAP",
  extractionBatchSize: "EXTRACTION_BATCH_SIZE",
  embeddingDimensions: "OPENAI_EMBEDDING_DIMENSIONS",
};

/**
 * Report the first zod issue under the environment variable it came from
 */
function firstIssue(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const key = issue?.path[0];
  const variable = typeof key === "string" ? ENV_BY_PATH[key] : undefined;
  const message = issue?.message ?? "Invalid configuration";
  return new ConfigurationError(
    variable ? `Invalid ${variable}: ${message}` : `Invalid configuration: ${message}`,
    variable
  );
}

/**
 * Load configuration from `env` (defaults to `process.env`)
 *
 * @param env - Environment variables to read
 * @returns Validated configuration with defaults filled in
 * @throws {ConfigurationError} when a value is present but invalid
 *
 * @example
 * ```typescript
 * const config = loadIngestionConfig();
 * if (!config.openai) {
 *   logger.info("OPENAI_API_KEY not set; embedding, NER and LLM extraction disabled");
 * }
 * ```
 */
export function loadIngestionConfig(env: NodeJS.ProcessEnv = process.env): IngestionConfig {
  const logLevelRaw = (env["LOG_LEVEL"] ?? "info").toLowerCase();
  const logLevel = LogLevelSchema.safeParse(logLevelRaw);
  if (!logLevel.success) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevelRaw}". Must be one of: ${LOG_LEVELS.join(", ")}`,
      "LOG_LEVEL"
    );
  }

  const timeoutRaw = env["PIPELINE_TIMEOUT_MS"];
  const pipeline = PipelineDefaultsSchema.safeParse({
    timeoutMs: timeoutRaw ? parseEnvInt(timeoutRaw, NaN) : undefined,
    strictValidation: parseEnvBoolean(env["PIPELINE_STRICT_VALIDATION"], false),
    chunkSize: parseEnvInt(env["CHUNK_SIZE"], 1000),
    chunkOverlap: parseEnvInt(env["CHUNK_OVERLAP"], 200),
    extractionBatchSize: parseEnvInt(env["EXTRACTION_BATCH_SIZE"], 50),
  });
  if (!pipeline.success) {
    throw firstIssue(pipeline.error);
  }

  const apiKey = env["OPENAI_API_KEY"]?.trim();
  let openai: OpenAIConnectionConfig | undefined;
  if (apiKey) {
    const dimensions = z
      .number()
      .int()
      .positive()
      .safeParse(parseEnvInt(env["OPENAI_EMBEDDING_DIMENSIONS"], 1536));
    if (!dimensions.success) {
      throw new ConfigurationError(
        "Invalid OPENAI_EMBEDDING_DIMENSIONS: must be a positive integer",
        "OPENAI_EMBEDDING_DIMENSIONS"
      );
    }
    openai = {
      apiKey,
      embeddingModel: env["OPENAI_EMBEDDING_MODEL"] || "text-embedding-3-small",
      embeddingDimensions: dimensions.data,
      chatModel: env["OPENAI_CHAT_MODEL"] || "gpt-4o-mini",
    };
  }

  return {
    logLevel: logLevel.data,
    logFormat: env["LOG_FORMAT"] === "json" ? "json" : "pretty",
    neo4j: {
      uri: env["NEO4J_URI"] || "bolt://localhost:7687",
      username: env["NEO4J_USER"] || "neo4j",
      password: env["NEO4J_PASSWORD"] || undefined,
      database: env["NEO4J_DATABASE"] || undefined,
    },
    openai,
    entityIndex: {
      url: env["CHROMADB_URL"] || "http://localhost:8000",
      collection: env["ENTITY_COLLECTION"] || "kg_entities",
      enabled: parseEnvBoolean(env["ENTITY_INDEXING_ENABLED"], true),
    },
    pipeline: pipeline.data,
    retry: createRetryConfigFromEnv(env),
  };
}
