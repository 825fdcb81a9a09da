/**
 * Graph domain types
 *
 * Entities and relations are the typed node/edge candidates produced by
 * extraction, reconciled by the merge step and handed to a
 * {@link GraphGateway} for persistence.
 *
 * @module graph/types
 */

/**
 * Closed set of entity (node label) types
 */
export const ENTITY_TYPES = [
  "Person",
  "Movie",
  "Studio",
  "Organization",
  "Location",
  "Concept",
  "Generic",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Closed set of relation (edge) types
 */
export const RELATION_TYPES = [
  "ACTED_IN",
  "DIRECTED",
  "PRODUCED_BY",
  "WORKS_AT",
  "KNOWS",
  "RELATED_TO",
  "LOCATED_IN",
  "PART_OF",
] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

/**
 * Property values a graph node or edge can carry
 */
export type PropertyValue = string | number | boolean | null | PropertyValue[];

export type Properties = Record<string, PropertyValue>;

/**
 * Typed node candidate
 *
 * Identity within a run is `(type, lowercase(name))`.
 */
export interface Entity {
  type: EntityType;
  name: string;
  properties: Properties;
  /** Source filename the entity was extracted from */
  source?: string;
  /** Extraction confidence in [0, 1] */
  confidence: number;
}

/**
 * Typed edge candidate between two entities referenced by name
 *
 * Identity within a run is `(type, lowercase(fromEntity), lowercase(toEntity))`.
 */
export interface Relation {
  type: RelationType;
  /** Name of the source entity */
  fromEntity: string;
  /** Name of the target entity */
  toEntity: string;
  /**
   * Type of the source entity; set from the resolved entity once the
   * Extraction stage has matched the endpoint by name
   */
  fromEntityType?: EntityType;
  toEntityType?: EntityType;
  properties: Properties;
  source?: string;
  confidence: number;
}

/**
 * Graph-wide counts returned by {@link GraphGateway.stats}
 */
export interface GraphStats {
  totalNodes: number;
  totalRelationships: number;
  byLabel: Record<string, number>;
  byType: Record<string, number>;
}

/**
 * A node of a {@link GraphVisualization}
 */
export interface GraphVisualNode {
  id: string;
  /** First label of the node */
  label: string;
  name: string;
  properties: Record<string, unknown>;
}

export interface GraphVisualEdge {
  id: string;
  type: string;
  /** Id of the start node */
  source: string;
  /** Id of the end node */
  target: string;
  properties: Record<string, unknown>;
}

export interface GraphVisualization {
  nodes: GraphVisualNode[];
  edges: GraphVisualEdge[];
}

/**
 * Storage gateway for the knowledge graph
 *
 * Upserts are keyed by entity name within a label: a later upsert with the
 * same name overwrites the matching properties and never duplicates the node.
 */
export interface GraphGateway {
  /**
   * Persist entities, returning one identifier per input entity, in order
   */
  upsertEntities(entities: readonly Entity[]): Promise<string[]>;

  /**
   * Persist relations between already-stored entities. Relations whose
   * endpoints are not found are not created; the returned list only holds
   * ids for created or matched edges.
   */
  upsertRelations(relations: readonly Relation[]): Promise<string[]>;

  /** Node and relationship totals, also per label and per type */
  stats(): Promise<GraphStats>;

  /**
   * Sample of at most `limit` nodes and the edges between them
   */
  visualize(limit: number): Promise<GraphVisualization>;

  /**
   * Remove every node and relationship
   */
  clear(): Promise<void>;
}
