export type { EntityIndex, EntityCollection, EntityUpsert, EntityMetadataValue } from "./types.js";
export { EntityIndexError } from "./errors.js";
export {
  ChromaEntityIndex,
  entityIndexId,
  entityDocument,
  entityMetadata,
  type ChromaEntityIndexConfig,
  type CollectionResolver,
} from "./ChromaEntityIndex.js";
