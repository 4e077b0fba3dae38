/**
 * PromptChunker
 *
 * Packs the document text into extraction requests that each fit the
 * configured budget, schema instructions included. Whole pages are kept
 * together whenever a page fits; a page larger than the budget is cut at
 * the last whitespace before the limit. Boundaries depend only on the text
 * and the budget.
 */

import { ConfigurationError } from "../errors.js";
import {
  CHINESE_NOTE,
  REDACTION_NOTE,
  buildExtractionSystemPrompt,
  buildExtractionUserPrompt,
  extractionNotes,
} from "../llm/prompts/extract.js";
import type { PolicySchema } from "../schema/policy-schema.js";
import type {
  ChunkBudget,
  ChunkPrompt,
  DocumentText,
  ExtractionChunk,
} from "../types.js";

const CHARS_PER_TOKEN = 4;
const WHITESPACE = /\s/;

interface Range {
  start: number;
  end: number;
}

/** Prompt size in the budget's unit (tokens are estimated from characters). */
export function promptSize(prompt: ChunkPrompt, unit: ChunkBudget["unit"]): number {
  const chars = prompt.system.length + prompt.user.length;
  return unit === "chars" ? chars : Math.ceil(chars / CHARS_PER_TOKEN);
}

function digits(n: number): number {
  return String(n).length;
}

/**
 * End offset for a piece of at most `capacity` chars starting at `pos`,
 * right after the last whitespace, else a hard cut that keeps surrogate
 * pairs whole.
 */
function splitPoint(text: string, pos: number, capacity: number): number {
  const limit = pos + capacity;
  for (let i = limit - 1; i >= pos; i--) {
    if (WHITESPACE.test(text[i])) return i + 1;
  }
  const code = text.charCodeAt(limit - 1);
  const isHighSurrogate = code >= 0xd800 && code <= 0xdbff;
  return isHighSurrogate && limit - 1 > pos ? limit - 1 : limit;
}

export class PromptChunker {
  readonly systemPrompt: string;
  private limitChars: number;

  constructor(
    schema: PolicySchema,
    private budget: ChunkBudget,
  ) {
    this.systemPrompt = buildExtractionSystemPrompt(schema);
    this.limitChars =
      budget.unit === "chars" ? budget.size : budget.size * CHARS_PER_TOKEN;
    // Fails at startup when even a one-part document cannot fit
    this.capacity(1);
  }

  /**
   * Room left for excerpt text when the part header is `d` digits wide,
   * reserving both notes and the retry suffix.
   */
  private capacity(d: number): number {
    const widest = Number("9".repeat(d));
    const overhead = buildExtractionUserPrompt({
      text: "",
      part: widest,
      total: widest,
      notes: [CHINESE_NOTE, REDACTION_NOTE],
      strict: true,
    }).length;
    const capacity = this.limitChars - this.systemPrompt.length - overhead;
    if (capacity < 1) {
      throw new ConfigurationError(
        `Chunk budget ${this.budget.size} ${this.budget.unit} leaves no room for document text ` +
          `(instructions alone take ${this.limitChars - capacity} chars)`,
      );
    }
    return capacity;
  }

  chunk(document: DocumentText): ExtractionChunk[] {
    if (document.text.length === 0) return [];

    let d = 1;
    let ranges = this.pack(document, this.capacity(d));
    while (digits(ranges.length) > d) {
      d = digits(ranges.length);
      ranges = this.pack(document, this.capacity(d));
    }

    const total = ranges.length;
    const chunks = ranges.map((range, index): ExtractionChunk => {
      const text = document.text.slice(range.start, range.end);
      const notes = extractionNotes(text);
      const user = (strict: boolean) =>
        buildExtractionUserPrompt({ text, part: index + 1, total, notes, strict });

      return Object.freeze({
        index,
        text,
        start: range.start,
        end: range.end,
        pageIndices: Object.freeze(
          document.spans
            .filter((s) => s.start < range.end && s.end > range.start)
            .map((s) => s.pageIndex),
        ),
        prompt: Object.freeze({ system: this.systemPrompt, user: user(false) }),
        retryPrompt: Object.freeze({ system: this.systemPrompt, user: user(true) }),
      });
    });

    console.log(
      `[PromptChunker] ${document.text.length} chars -> ${total} chunk(s) (budget ${this.budget.size} ${this.budget.unit})`,
    );
    return chunks;
  }

  private pack(document: DocumentText, capacity: number): Range[] {
    const ranges: Range[] = [];
    let current: Range | null = null;

    for (const span of document.spans) {
      const length = span.end - span.start;

      if (current && current.end - current.start + length <= capacity) {
        current.end = span.end;
        continue;
      }
      if (current) ranges.push(current);

      if (length <= capacity) {
        current = { start: span.start, end: span.end };
        continue;
      }

      let pos = span.start;
      while (span.end - pos > capacity) {
        const cut = splitPoint(document.text, pos, capacity);
        ranges.push({ start: pos, end: cut });
        pos = cut;
      }
      current = { start: pos, end: span.end };
    }

    if (current) ranges.push(current);
    return ranges;
  }
}
