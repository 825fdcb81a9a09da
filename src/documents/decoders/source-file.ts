/**
 * File access shared by the decoders
 *
 * @module documents/decoders/source-file
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FileAccessError } from "../errors.js";

export interface SourceFile {
  filename: string;
  sizeBytes: number;
  buffer: Buffer;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a filesystem failure onto a {@link FileAccessError}
 */
export function toFileAccessError(error: unknown, filePath: string): FileAccessError {
  const cause = error instanceof Error ? error : undefined;
  switch (errnoCode(error)) {
    case "ENOENT":
      return new FileAccessError(`File not found: ${filePath}`, { filePath, cause });
    case "EACCES":
    case "EPERM":
      return new FileAccessError(`Permission denied: ${filePath}`, { filePath, cause });
    case "EISDIR":
      return new FileAccessError(`Expected a file but found a directory: ${filePath}`, {
        filePath,
        cause,
      });
    default:
      return new FileAccessError(`Cannot access file: ${filePath}`, { filePath, cause });
  }
}

/**
 * Stat a file, rejecting directories and anything unreadable
 *
 * @throws {FileAccessError}
 */
export async function statSourceFile(
  filePath: string
): Promise<{ filename: string; sizeBytes: number }> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new FileAccessError(`Not a regular file: ${filePath}`, { filePath });
    }
    return { filename: path.basename(filePath), sizeBytes: stats.size };
  } catch (error) {
    if (error instanceof FileAccessError) {
      throw error;
    }
    throw toFileAccessError(error, filePath);
  }
}

/**
 * Read a whole file
 *
 * @throws {FileAccessError}
 */
export async function readSourceFile(filePath: string): Promise<SourceFile> {
  try {
    const buffer = await fs.readFile(filePath);
    return { filename: path.basename(filePath), sizeBytes: buffer.byteLength, buffer };
  } catch (error) {
    throw toFileAccessError(error, filePath);
  }
}

/**
 * Decode UTF-8 text, dropping a byte-order mark and normalizing line endings
 */
export function toText(buffer: Buffer): string {
  return normalizeText(buffer.toString("utf8"));
}

export function normalizeText(text: string): string {
  return text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}
