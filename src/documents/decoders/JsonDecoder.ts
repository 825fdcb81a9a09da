/**
 * Semi-structured decoder (JSON)
 *
 * @module documents/decoders/JsonDecoder
 */

import type pino from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { DecodeError } from "../errors.js";
import type { DecodeResult, Decoder, DocumentFormat, ObjectRecord } from "../types.js";
import { readSourceFile, toText } from "./source-file.js";

const SAMPLE_RECORD_COUNT = 3;

type TopLevelType = "array" | "object" | "scalar";

/**
 * Pick the items to treat as records
 *
 * - array: every element
 * - object: the elements of the first array-valued key, else the object itself
 * - scalar: the value itself
 */
export function selectRecords(value: unknown): { items: unknown[]; recordsKey?: string } {
  if (Array.isArray(value)) {
    return { items: value };
  }
  if (typeof value === "object" && value !== null) {
    for (const [key, nested] of Object.entries(value)) {
      if (Array.isArray(nested)) {
        return { items: nested, recordsKey: key };
      }
    }
  }
  return { items: [value] };
}

function topLevelTypeOf(value: unknown): TopLevelType {
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value === "object" && value !== null ? "object" : "scalar";
}

/**
 * Union of keys across object records, in first-seen order
 */
function collectKeys(items: readonly unknown[]): string[] {
  const keys = new Set<string>();
  for (const item of items) {
    if (typeof item === "object" && item !== null && !Array.isArray(item)) {
      Object.keys(item).forEach((key) => keys.add(key));
    }
  }
  return [...keys];
}

/**
 * Decodes a JSON document into {@link ObjectRecord}s
 *
 * Metadata: `topLevelType`, `recordsKey` (when records came from a nested
 * array), `keys`, `recordCount`, `sampleRecords` (first 3).
 */
export class JsonDecoder implements Decoder {
  readonly formats: readonly DocumentFormat[] = ["json"];

  private _logger: pino.Logger | null = null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("documents:decoder:json");
    }
    return this._logger;
  }

  /**
   * @throws {DecodeError} when the file is not valid JSON
   */
  async decode(filePath: string, format: DocumentFormat): Promise<DecodeResult> {
    const source = await readSourceFile(filePath);
    const text = toText(source.buffer);

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new DecodeError(`Invalid JSON: ${cause?.message ?? String(error)}`, {
        filePath,
        cause,
      });
    }

    const { items, recordsKey } = selectRecords(parsed);
    const records: ObjectRecord[] = items.map((value, index) => ({ kind: "object", index, value }));

    this.logger.debug(
      { filename: source.filename, records: records.length, recordsKey },
      "Decoded JSON file"
    );

    return {
      records,
      metadata: {
        filename: source.filename,
        sizeBytes: source.sizeBytes,
        format,
        topLevelType: topLevelTypeOf(parsed),
        ...(recordsKey !== undefined && { recordsKey }),
        keys: collectKeys(items),
        recordCount: records.length,
        sampleRecords: items.slice(0, SAMPLE_RECORD_COUNT),
      },
    };
  }
}
