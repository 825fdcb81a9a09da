/**
 * Tabular decoder (CSV and TSV)
 *
 * @module documents/decoders/CsvDecoder
 */

import { parse } from "csv-parse/sync";
import type pino from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { DecodeError } from "../errors.js";
import type { DecodeResult, Decoder, DocumentFormat, RowRecord } from "../types.js";
import { readSourceFile, toText } from "./source-file.js";

/** Type inferred for a column from its sampled values */
export type ColumnType = "integer" | "float" | "date" | "boolean" | "string" | "empty";

/** Delimiters considered by detection, in tie-break order */
export const CANDIDATE_DELIMITERS = [",", ";", "\t", "|"] as const;

const SAMPLE_ROW_COUNT = 3;
const TYPE_SAMPLE_SIZE = 5;
const DATE_COLUMN_HINTS = ["date", "time", "year", "created", "updated"];
const BOOLEAN_VALUES = new Set(["true", "false", "yes", "no"]);

/**
 * Pick the candidate delimiter occurring most often in the header line.
 * Ties go to the earlier candidate; a line with none yields ",".
 */
export function detectDelimiter(firstLine: string): string {
  let best: string = ",";
  let bestCount = 0;
  for (const candidate of CANDIDATE_DELIMITERS) {
    const count = firstLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Infer a column type from a sample of its non-empty values
 *
 * Numeric columns win over the name hint, so a `year` column of plain
 * numbers is `integer`.
 */
export function inferColumnType(column: string, values: readonly string[]): ColumnType {
  const sample = values.filter((value) => value.trim() !== "").slice(0, TYPE_SAMPLE_SIZE);
  if (sample.length === 0) {
    return "empty";
  }

  if (sample.every((value) => /^[-+]?\d+$/.test(value.trim()))) {
    return "integer";
  }
  if (sample.every((value) => value.trim() !== "" && Number.isFinite(Number(value)))) {
    return "float";
  }

  const lowered = column.toLowerCase();
  if (
    DATE_COLUMN_HINTS.some((hint) => lowered.includes(hint)) ||
    sample.every((value) => /^\d{4}-\d{2}-\d{2}([T ][\d:.]+Z?)?$/.test(value.trim()))
  ) {
    return "date";
  }

  if (sample.every((value) => BOOLEAN_VALUES.has(value.trim().toLowerCase()))) {
    return "boolean";
  }

  return "string";
}

/**
 * Make header names unique and non-empty: blanks become `column_<n>`,
 * repeats get a `_<n>` suffix
 */
function normalizeHeader(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((raw, position) => {
    const base = raw.trim() === "" ? `column_${position + 1}` : raw.trim();
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

/** Keep only rows that csv-parse returned as string arrays */
function toRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.map((row: unknown) =>
    Array.isArray(row)
      ? row.map((cell: unknown) => (cell === null || cell === undefined ? "" : String(cell)))
      : []
  );
}

/**
 * Decodes delimited text into {@link RowRecord}s, one per data row
 *
 * Metadata: `columns`, `columnTypes`, `rowCount`, `sampleRows` (first 3),
 * `delimiter`.
 *
 * @example
 * ```typescript
 * const { records, metadata } = await new CsvDecoder().decode("/data/movies.csv", "csv");
 * metadata.columns; // ["title", "year", "director"]
 * ```
 */
export class CsvDecoder implements Decoder {
  readonly formats: readonly DocumentFormat[] = ["csv", "tsv"];

  private _logger: pino.Logger | null = null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("documents:decoder:csv");
    }
    return this._logger;
  }

  /**
   * @param filePath - Path of the CSV or TSV file
   * @param format - "csv" or "tsv"; TSV always splits on tabs
   * @returns One row record per data line, keyed by the normalized header
   * @throws {DecodeError} for malformed quoting or inconsistent rows
   */
  async decode(filePath: string, format: DocumentFormat): Promise<DecodeResult> {
    const source = await readSourceFile(filePath);
    const text = toText(source.buffer);

    const firstLine = text.split("\n", 1)[0] ?? "";
    const delimiter = format === "tsv" ? "\t" : detectDelimiter(firstLine);

    let rows: string[][];
    try {
      rows = toRows(
        parse(text, {
          delimiter,
          skip_empty_lines: true,
          relax_column_count: true,
          trim: true,
        })
      );
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const reason = cause?.message ?? String(error);
      throw new DecodeError(`Malformed ${format.toUpperCase()}: ${reason}`, { filePath, cause });
    }

    const [headerRow, ...dataRows] = rows;
    const columns = normalizeHeader(headerRow ?? []);

    const records: RowRecord[] = dataRows.map((cells, index) => {
      const values: Record<string, string> = {};
      columns.forEach((column, position) => {
        values[column] = cells[position] ?? "";
      });
      return { kind: "row", index, values };
    });

    const columnTypes: Record<string, ColumnType> = {};
    for (const column of columns) {
      columnTypes[column] = inferColumnType(
        column,
        records.map((record) => record.values[column] ?? "")
      );
    }

    this.logger.debug(
      { filename: source.filename, delimiter, columns: columns.length, rows: records.length },
      "Decoded tabular file"
    );

    return {
      records,
      metadata: {
        filename: source.filename,
        sizeBytes: source.sizeBytes,
        format,
        delimiter,
        columns,
        columnTypes,
        rowCount: records.length,
        sampleRows: records.slice(0, SAMPLE_ROW_COUNT).map((record) => ({ ...record.values })),
      },
    };
  }
}
