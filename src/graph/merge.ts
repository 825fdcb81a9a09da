/**
 * Deduplication and merge of extraction candidates
 *
 * Candidates arrive from several extraction batches and may repeat the same
 * entity or relation. They are reconciled by identity key:
 *
 * - entity key: `(type, lowercase(name))`
 * - relation key: `(type, lowercase(fromEntity), lowercase(toEntity))`
 *
 * The first occurrence of a key is kept as the running record. Each repeat
 * is merged into it pairwise: properties of the newer record overwrite the
 * kept ones and unseen keys are added, and confidence becomes the mean of
 * the two. Three duplicates therefore end at `avg(avg(c1, c2), c3)`, not at
 * the mean of all three. Output keeps first-seen order.
 *
 * @module graph/merge
 */

import type { Entity, Relation } from "./types.js";

/**
 * Identity key of an entity
 *
 * @example
 * ```typescript
 * entityKey({ type: "Person", name: "Tom Hanks", ... }) // "Person\u0000tom hanks"
 * ```
 */
export function entityKey(entity: Pick<Entity, "type" | "name">): string {
  return `${entity.type}\u0000${entity.name.toLowerCase()}`;
}

/**
 * Identity key of a relation
 *
 * Endpoint types are not part of the key; two relations of the same type
 * between the same names are one relation.
 *
 * @param relation - Relation type and endpoint names
 * @returns NUL-separated key of the type and lowercased endpoint names
 */
export function relationKey(relation: Pick<Relation, "type" | "fromEntity" | "toEntity">): string {
  return `${relation.type}\u0000${relation.fromEntity.toLowerCase()}\u0000${relation.toEntity.toLowerCase()}`;
}

/**
 * Generic first-seen-order reduction by key
 *
 * `mergeTwo(kept, incoming)` returns the new running record for the key. The
 * first occurrence is passed through `copy` so callers never observe their
 * input objects being mutated.
 *
 * @param items - Candidates in arrival order
 * @param keyOf - Identity key of a candidate
 * @param mergeTwo - Combines the running record with a repeat of its key
 * @param copy - Applied to the first occurrence of each key; identity by default
 * @returns One record per key, ordered by first occurrence
 *
 * @example
 * ```typescript
 * mergeByKey([1, 2, 11], (n) => String(n % 10), (a, b) => a + b);
 * // [12, 2]
 * ```
 */
export function mergeByKey<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  mergeTwo: (kept: T, incoming: T) => T,
  copy: (item: T) => T = (item) => item
): T[] {
  const byKey = new Map<string, T>();

  for (const item of items) {
    const key = keyOf(item);
    const kept = byKey.get(key);
    // Map preserves insertion order, and set() on an existing key keeps its position
    byKey.set(key, kept === undefined ? copy(item) : mergeTwo(kept, item));
  }

  return [...byKey.values()];
}

/** Newer properties win; confidence is the pairwise mean */
function mergeEntityPair(kept: Entity, incoming: Entity): Entity {
  return {
    ...kept,
    properties: { ...kept.properties, ...incoming.properties },
    confidence: (kept.confidence + incoming.confidence) / 2,
  };
}

function mergeRelationPair(kept: Relation, incoming: Relation): Relation {
  return {
    ...kept,
    properties: { ...kept.properties, ...incoming.properties },
    confidence: (kept.confidence + incoming.confidence) / 2,
  };
}

/**
 * Deduplicate entities by `(type, lowercase(name))`
 *
 * The kept record retains the first occurrence's name spelling and source.
 * Running this on an already-deduplicated list returns an equal list.
 *
 * @param entities - Candidates from every extraction batch
 * @returns New entity objects; the inputs are not mutated
 */
export function mergeEntities(entities: readonly Entity[]): Entity[] {
  return mergeByKey(entities, entityKey, mergeEntityPair, (entity) => ({
    ...entity,
    properties: { ...entity.properties },
  }));
}

/**
 * Deduplicate relations by `(type, lowercase(from), lowercase(to))`
 *
 * @param relations - Candidates from every extraction batch
 * @returns New relation objects in first-seen order
 */
export function mergeRelations(relations: readonly Relation[]): Relation[] {
  return mergeByKey(relations, relationKey, mergeRelationPair, (relation) => ({
    ...relation,
    properties: { ...relation.properties },
  }));
}
