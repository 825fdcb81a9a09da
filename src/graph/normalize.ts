/**
 * Normalization of extraction candidates
 *
 * Extraction collaborators return loosely-shaped data: typed objects,
 * camelCase maps, snake_case maps, type names in any case. Everything is
 * converted here, at the boundary, into {@link Entity} and {@link Relation}
 * values; nothing untyped reaches the merge or storage steps.
 *
 * @module graph/normalize
 */

import { z } from "zod";
import {
  ENTITY_TYPES,
  RELATION_TYPES,
  type Entity,
  type EntityType,
  type PropertyValue,
  type Properties,
  type Relation,
  type RelationType,
} from "./types.js";

/** Confidence assigned when a candidate carries none */
export const DEFAULT_CONFIDENCE = 0.95;

/**
 * Map a type name onto the closed entity set, case-insensitively.
 * Unknown or missing names become `Generic`.
 *
 * @param value - Type name from a candidate, of any shape
 * @returns Member of {@link ENTITY_TYPES}
 */
export function toEntityType(value: unknown): EntityType {
  if (typeof value !== "string") {
    return "Generic";
  }
  const wanted = value.trim().toLowerCase();
  return ENTITY_TYPES.find((type) => type.toLowerCase() === wanted) ?? "Generic";
}

/**
 * Map a type name onto the closed relation set. Accepts `acted in`,
 * `acted-in` and `ACTED_IN` alike; unknown names become `RELATED_TO`.
 */
export function toRelationType(value: unknown): RelationType {
  if (typeof value !== "string") {
    return "RELATED_TO";
  }
  const wanted = value
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, "_");
  return RELATION_TYPES.find((type) => type === wanted) ?? "RELATED_TO";
}

/**
 * Scalar, list or JSON text; undefined for values that cannot be stored
 */
function toPropertyValue(value: unknown): PropertyValue | undefined {
  if (value === undefined || typeof value === "function" || typeof value === "symbol") {
    return undefined;
  }
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (Array.isArray(value)) {
    const items: PropertyValue[] = [];
    for (const item of value) {
      const converted = toPropertyValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }
  // Nested maps are flattened to JSON text: graph properties are scalar or lists
  return JSON.stringify(value) ?? null;
}

/**
 * Convert an arbitrary map into graph-safe properties
 *
 * Non-finite numbers are dropped, bigints become numbers and nested objects
 * become JSON text. Anything other than a plain object yields `{}`.
 *
 * @param value - Candidate `properties` field
 */
export function toProperties(value: unknown): Properties {
  const properties: Properties = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return properties;
  }
  for (const [key, raw] of Object.entries(value)) {
    const converted = toPropertyValue(raw);
    if (converted !== undefined) {
      properties[key] = converted;
    }
  }
  return properties;
}

const confidenceSchema = z
  .union([z.number(), z.string()])
  .optional()
  .transform((value) => {
    const numeric = typeof value === "string" ? parseFloat(value) : value;
    if (numeric === undefined || !Number.isFinite(numeric)) {
      return DEFAULT_CONFIDENCE;
    }
    return Math.min(1, Math.max(0, numeric));
  });

const nameSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const EntityCandidateSchema = z
  .object({
    type: z.unknown(),
    entity_type: z.unknown(),
    name: nameSchema,
    properties: z.unknown(),
    source: z.string().optional(),
    confidence: confidenceSchema,
  })
  .transform(
    (candidate): Entity => ({
      type: toEntityType(candidate.type ?? candidate.entity_type),
      name: candidate.name,
      properties: toProperties(candidate.properties),
      ...(candidate.source !== undefined && { source: candidate.source }),
      confidence: candidate.confidence,
    })
  );

const RelationCandidateSchema = z
  .object({
    type: z.unknown(),
    relation_type: z.unknown(),
    fromEntity: nameSchema.optional(),
    from_entity: nameSchema.optional(),
    from: nameSchema.optional(),
    toEntity: nameSchema.optional(),
    to_entity: nameSchema.optional(),
    to: nameSchema.optional(),
    fromEntityType: z.unknown(),
    from_entity_type: z.unknown(),
    toEntityType: z.unknown(),
    to_entity_type: z.unknown(),
    properties: z.unknown(),
    source: z.string().optional(),
    confidence: confidenceSchema,
  })
  .transform((candidate, ctx): Relation => {
    const fromEntity = candidate.fromEntity ?? candidate.from_entity ?? candidate.from;
    const toEntity = candidate.toEntity ?? candidate.to_entity ?? candidate.to;
    if (fromEntity === undefined || toEntity === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "relation endpoints are required" });
      return z.NEVER;
    }
    const fromType = candidate.fromEntityType ?? candidate.from_entity_type;
    const toType = candidate.toEntityType ?? candidate.to_entity_type;
    return {
      type: toRelationType(candidate.type ?? candidate.relation_type),
      fromEntity,
      toEntity,
      ...(fromType !== undefined && fromType !== null && { fromEntityType: toEntityType(fromType) }),
      ...(toType !== undefined && toType !== null && { toEntityType: toEntityType(toType) }),
      properties: toProperties(candidate.properties),
      ...(candidate.source !== undefined && { source: candidate.source }),
      confidence: candidate.confidence,
    };
  });

/**
 * Outcome of normalizing a candidate list
 */
export interface NormalizationResult<T> {
  items: T[];
  /** Candidates that could not be turned into a typed value, with the reason */
  rejected: Array<{ index: number; reason: string }>;
}

/**
 * Parse each candidate with `schema`, collecting failures by index
 *
 * @param withSource - Stamps the fallback source when `source` is given
 */
function normalizeAll<T>(
  candidates: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string | undefined,
  withSource: (item: T, source: string) => T
): NormalizationResult<T> {
  const result: NormalizationResult<T> = { items: [], rejected: [] };

  candidates.forEach((candidate, index) => {
    const parsed = schema.safeParse(candidate);
    if (parsed.success) {
      result.items.push(source === undefined ? parsed.data : withSource(parsed.data, source));
    } else {
      const issue = parsed.error.issues[0];
      const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      result.rejected.push({ index, reason: `${path}${issue?.message ?? "invalid candidate"}` });
    }
  });

  return result;
}

/**
 * Normalize entity candidates
 *
 * @param source - filename stamped on entities that do not name their own source
 *
 * @example
 * ```typescript
 * const { items } = normalizeEntities([{ type: "person", name: " Tom Hanks " }], "movies.csv");
 * // [{ type: "Person", name: "Tom Hanks", properties: {}, source: "movies.csv", confidence: 0.95 }]
 * ```
 */
export function normalizeEntities(
  candidates: readonly unknown[],
  source?: string
): NormalizationResult<Entity> {
  return normalizeAll(candidates, EntityCandidateSchema, source, (entity, fallback) => ({
    ...entity,
    source: entity.source ?? fallback,
  }));
}

/**
 * Normalize relation candidates. Endpoint names are required; endpoint
 * types are optional and resolved later against the entity set.
 *
 * Accepts `fromEntity`, `from_entity` or `from` for the source endpoint and
 * the matching forms for the target.
 *
 * @param candidates - Raw candidates from the extraction agent
 * @param source - Filename stamped on relations that do not name their own source
 * @returns Typed relations plus the index and reason of each rejected candidate
 */
export function normalizeRelations(
  candidates: readonly unknown[],
  source?: string
): NormalizationResult<Relation> {
  return normalizeAll(candidates, RelationCandidateSchema, source, (relation, fallback) => ({
    ...relation,
    source: relation.source ?? fallback,
  }));
}
