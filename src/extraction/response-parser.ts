/**
 * Parsing of model answers that should be a JSON array
 *
 * @module extraction/response-parser
 */

import { ResponseParseError } from "./errors.js";

const FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Drop a surrounding Markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  return (match?.[1] ?? trimmed).trim();
}

/**
 * Parse a model answer into an array
 *
 * Accepts a bare array, a fenced array, an array embedded in prose, or an
 * object wrapping the array under its first array-valued key.
 *
 * @throws {ResponseParseError} when no array can be recovered
 *
 * @example
 * ```typescript
 * parseJsonArray('```json\n[{"type":"Person","name":"Tom Hanks"}]\n```');
 * // [{ type: "Person", name: "Tom Hanks" }]
 * ```
 */
export function parseJsonArray(answer: string): unknown[] {
  const body = stripCodeFence(answer);
  if (body.length === 0) {
    return [];
  }

  const parsed = tryParse(body) ?? tryParse(sliceArray(body));
  if (parsed === undefined) {
    throw new ResponseParseError(`Model response is not valid JSON: ${preview(body)}`);
  }
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === "object" && parsed !== null) {
    const nested = Object.values(parsed).find((value) => Array.isArray(value));
    if (Array.isArray(nested)) {
      return nested;
    }
  }
  throw new ResponseParseError(`Model response is not a JSON array: ${preview(body)}`);
}

/** Parsed value, or undefined for missing or invalid JSON */
function tryParse(text: string | undefined): unknown {
  if (text === undefined) {
    return undefined;
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Text from the first `[` to the last `]`, for arrays wrapped in prose
 */
function sliceArray(text: string): string | undefined {
  const start = text.indexOf("[");
  const end = text.lastIndexOf("]");
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined;
}

function preview(text: string): string {
  return text.length > 80 ? `${text.slice(0, 80)}...` : text;
}
