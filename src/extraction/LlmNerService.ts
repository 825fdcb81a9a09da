/**
 * Named-entity recognition over a chat model
 *
 * @module extraction/LlmNerService
 */

import { z } from "zod";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { buildNerPrompt } from "./prompts.js";
import { parseJsonArray } from "./response-parser.js";
import { ChatClientError, NerError } from "./errors.js";
import type { ChatClient, ExtractionCallOptions, NerMention, NerService } from "./types.js";

const MentionSchema = z.object({
  text: z.string().min(1),
  label: z
    .string()
    .min(1)
    .transform((label) => label.trim().toUpperCase()),
  confidence: z.number().min(0).max(1).optional(),
});

/**
 * Locates each span the model names in the analysed text. Spans that do not
 * occur verbatim are dropped; a span repeated in the answer is matched to
 * successive occurrences.
 */
export function locateMentions(text: string, candidates: readonly unknown[]): NerMention[] {
  const mentions: NerMention[] = [];
  const searchFrom = new Map<string, number>();

  for (const candidate of candidates) {
    const parsed = MentionSchema.safeParse(candidate);
    if (!parsed.success) {
      continue;
    }
    const { text: span, label, confidence } = parsed.data;
    const start = text.indexOf(span, searchFrom.get(span) ?? 0);
    if (start < 0) {
      continue;
    }
    searchFrom.set(span, start + span.length);
    mentions.push({ text: span, label, start, end: start + span.length, confidence: confidence ?? 0.9 });
  }

  return mentions.sort((a, b) => a.start - b.start);
}

/**
 * @example
 * ```typescript
 * const ner = new LlmNerService(chat);
 * await ner.extractEntities("Tom Hanks starred in Big.");
 * // [{ text: "Tom Hanks", label: "PERSON", start: 0, end: 9, confidence: 0.9 }, ...]
 * ```
 */
export class LlmNerService implements NerService {
  private _logger: pino.Logger | null = null;

  /** @param chat - Chat model client the NER prompt is sent to */
  constructor(private readonly chat: ChatClient) {}

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("extraction:ner");
    }
    return this._logger;
  }

  /**
   * Find typed mentions in `text`
   *
   * @param text - Chunk text; blank text yields no mentions and no request
   * @param options - Abort signal passed to the request
   * @returns Mentions with character offsets into `text`
   * @throws {NerError} when the request fails or the answer is not a JSON array
   */
  async extractEntities(text: string, options: ExtractionCallOptions = {}): Promise<NerMention[]> {
    if (text.trim().length === 0) {
      return [];
    }

    let candidates: unknown[];
    try {
      candidates = parseJsonArray(await this.chat.complete(buildNerPrompt(text), options));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new NerError(`NER failed: ${cause.message}`, "NER_FAILED", {
        retryable: error instanceof ChatClientError && error.retryable,
        cause,
      });
    }

    const mentions = locateMentions(text, candidates);
    if (mentions.length < candidates.length) {
      this.logger.debug(
        { candidates: candidates.length, located: mentions.length },
        "Dropped NER spans not found in text"
      );
    }
    return mentions;
  }
}
