export {
  loadIngestionConfig,
  ConfigurationError,
  type IngestionConfig,
  type Neo4jConnectionConfig,
  type OpenAIConnectionConfig,
  type EntityIndexConfig,
  type PipelineDefaultsConfig,
} from "./ingestion-config.js";
