/**
 * Prompt builders for LLM extraction and NER
 *
 * @module extraction/prompts
 */

import type { DecodedMetadata } from "../documents/types.js";
import { renderRow } from "../ingestion/record-chunker.js";
import { ENTITY_TYPES, RELATION_TYPES, type Entity } from "../graph/types.js";
import type { ExtractionUnit } from "./types.js";

/** Metadata keys echoed into prompts; everything else is noise to the model */
const PROMPT_METADATA_KEYS = ["filename", "format", "columns", "columnTypes", "keys", "headings"];

/**
 * Text of one unit as the model sees it
 */
export function renderUnit(unit: ExtractionUnit): string {
  if ("contentHash" in unit) {
    return unit.content;
  }
  switch (unit.kind) {
    case "row":
      return renderRow(unit);
    case "object":
      return JSON.stringify(unit.value, null, 2);
    case "text":
      return unit.content;
  }
}

function describeMetadata(metadata: DecodedMetadata): string {
  const lines: string[] = [];
  for (const key of PROMPT_METADATA_KEYS) {
    const value = metadata[key];
    if (value !== undefined) {
      lines.push(`- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
  }
  return lines.join("\n");
}

/** Units numbered `[1]`, `[2]`, ... separated by blank lines */
function renderUnits(units: readonly ExtractionUnit[]): string {
  return units.map((unit, i) => `[${i + 1}]\n${renderUnit(unit)}`).join("\n\n");
}

/**
 * Prompt asking for a JSON array of entities found in `units`
 *
 * @param units - Records or chunks of one batch
 * @param metadata - Document metadata shown to the model as context
 */
export function buildEntityPrompt(units: readonly ExtractionUnit[], metadata: DecodedMetadata): string {
  return `You extract entities for a knowledge graph.

Entity types: ${ENTITY_TYPES.join(", ")}.

Source:
${describeMetadata(metadata)}

Data:
${renderUnits(units)}

Rules:
1. Extract every entity mentioned in the data.
2. When one field lists several people (separated by ";" or ","), emit one entity per person.
3. Use names exactly as they appear.
4. Put every other known attribute in "properties".
5. Answer with a JSON array only, no explanation.

Format:
[{"type": "Person", "name": "...", "properties": {}, "confidence": 0.9}]`;
}

/**
 * Prompt asking for relations among the already-extracted entities
 *
 * Lists the known entities for the model to pick endpoints from.
 */
export function buildRelationPrompt(
  units: readonly ExtractionUnit[],
  entities: readonly Entity[],
  metadata: DecodedMetadata
): string {
  const known = entities.map((entity) => `- ${entity.type}: ${entity.name}`).join("\n");
  return `You extract relationships for a knowledge graph.

Relationship types: ${RELATION_TYPES.join(", ")}.

Known entities:
${known}

Source:
${describeMetadata(metadata)}

Data:
${renderUnits(units)}

Rules:
1. Only connect entities from the known list, using their exact names.
2. Answer with a JSON array only, no explanation.

Format:
[{"type": "ACTED_IN", "fromEntity": "...", "fromEntityType": "Person", "toEntity": "...", "toEntityType": "Movie", "properties": {}, "confidence": 0.9}]`;
}

export function buildNerPrompt(text: string): string {
  return `Find the named entities in the text below.

Labels: PERSON, ORG, GPE, LOC, DATE, WORK_OF_ART, PRODUCT, EVENT, MISC.

Text:
"""
${text}
"""

Answer with a JSON array only:
[{"text": "exact span", "label": "PERSON", "confidence": 0.9}]`;
}
