/**
 * Knowledge graph: entity/relation model, normalization, merge and the Neo4j gateway
 *
 * @module graph
 */

export * from "./types.js";
export * from "./errors.js";
export { entityKey, relationKey, mergeByKey, mergeEntities, mergeRelations } from "./merge.js";
export {
  DEFAULT_CONFIDENCE,
  toEntityType,
  toRelationType,
  toProperties,
  normalizeEntities,
  normalizeRelations,
  type NormalizationResult,
} from "./normalize.js";
export {
  Neo4jGraphGateway,
  createNeo4jDriver,
  type CypherDriver,
  type CypherDriverFactory,
  type CypherSession,
  type CypherRow,
} from "./Neo4jGraphGateway.js";
