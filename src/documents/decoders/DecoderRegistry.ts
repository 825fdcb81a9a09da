/**
 * Format → decoder lookup
 *
 * @module documents/decoders/DecoderRegistry
 */

import { UnsupportedFormatError } from "../errors.js";
import type { Decoder, DocumentFormat } from "../types.js";
import { CsvDecoder } from "./CsvDecoder.js";
import { JsonDecoder } from "./JsonDecoder.js";
import { PdfDecoder } from "./PdfDecoder.js";
import { PlainTextDecoder } from "./PlainTextDecoder.js";

/**
 * Holds one decoder per format. Registering a decoder claims every format it
 * lists; a later registration for the same format replaces the earlier one.
 *
 * @example
 * ```typescript
 * const registry = DecoderRegistry.withDefaults();
 * const { records } = await registry.get("csv").decode("/data/movies.csv", "csv");
 * ```
 */
export class DecoderRegistry {
  private readonly decoders = new Map<DocumentFormat, Decoder>();

  /**
   * @param decoders - Decoders to register; later ones win for a shared format
   */
  constructor(decoders: readonly Decoder[] = []) {
    decoders.forEach((decoder) => this.register(decoder));
  }

  /**
   * Registry with the CSV/TSV, JSON, text/Markdown and PDF decoders
   */
  static withDefaults(): DecoderRegistry {
    return new DecoderRegistry([
      new CsvDecoder(),
      new JsonDecoder(),
      new PlainTextDecoder(),
      new PdfDecoder(),
    ]);
  }

  /**
   * Register a decoder for every format it declares
   *
   * @returns The registry, for chaining
   */
  register(decoder: Decoder): this {
    decoder.formats.forEach((format) => this.decoders.set(format, decoder));
    return this;
  }

  has(format: DocumentFormat): boolean {
    return this.decoders.has(format);
  }

  /**
   * @throws {UnsupportedFormatError} when no decoder handles `format`
   */
  get(format: DocumentFormat): Decoder {
    const decoder = this.decoders.get(format);
    if (!decoder) {
      throw new UnsupportedFormatError(`No decoder registered for format "${format}"`, format);
    }
    return decoder;
  }

  formats(): DocumentFormat[] {
    return [...this.decoders.keys()];
  }
}
