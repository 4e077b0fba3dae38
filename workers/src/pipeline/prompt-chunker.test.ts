/**
 * Validation Suite: PromptChunker
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { PromptChunker, promptSize } from "./prompt-chunker.js";
import { assembleDocumentText } from "./document-text-assembler.js";
import { parsePolicySchema } from "../schema/policy-schema.js";
import {
  CHINESE_NOTE,
  REDACTION_NOTE,
  STRICT_RETRY_SUFFIX,
  buildExtractionUserPrompt,
} from "../llm/prompts/extract.js";
import { ConfigurationError } from "../errors.js";
import type { DocumentText, ExtractionChunk, Page } from "../types.js";

const schema = parsePolicySchema({
  title: "PolicyRecord",
  type: "object",
  properties: {
    vehicle: {
      type: "object",
      properties: { chassisNumber: { type: "string" } },
    },
  },
});

function page(index: number, text: string): Page {
  return {
    index,
    nativeText: text,
    ocrText: null,
    ocrError: null,
    text,
    method: "native",
    confidence: 1,
  };
}

function documentOf(...texts: string[]): DocumentText {
  return assembleDocumentText(texts.map((text, i) => page(i, text)));
}

/** Budget (in chars) that leaves `capacity` chars for text with one-digit part numbers */
function budgetFor(capacity: number): number {
  const probe = new PromptChunker(schema, { size: 1_000_000, unit: "chars" });
  const overhead = buildExtractionUserPrompt({
    text: "",
    part: 9,
    total: 9,
    notes: [CHINESE_NOTE, REDACTION_NOTE],
    strict: true,
  }).length;
  return probe.systemPrompt.length + overhead + capacity;
}

function expectWithinBudget(chunks: ExtractionChunk[], size: number) {
  for (const chunk of chunks) {
    expect(promptSize(chunk.prompt, "chars")).toBeLessThanOrEqual(size);
    expect(promptSize(chunk.retryPrompt, "chars")).toBeLessThanOrEqual(size);
  }
}

describe("PromptChunker", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should keep a small document in one self-contained chunk", () => {
    const doc = documentOf("Policy No: P-1", "Insured: Chan Tai Man");
    const chunks = new PromptChunker(schema, { size: 100_000, unit: "chars" }).chunk(doc);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe(doc.text);
    expect(chunks[0].start).toBe(0);
    expect(chunks[0].end).toBe(doc.text.length);
    expect(chunks[0].pageIndices).toEqual([0, 1]);
    expect(chunks[0].prompt.system).toContain("interface PolicyRecord");
    expect(chunks[0].prompt.user).toContain("(part 1 of 1)");
    expect(chunks[0].prompt.user).toContain(doc.text);
  });

  it("should never split a page that fits", () => {
    const doc = documentOf("a".repeat(20), "b".repeat(20), "c".repeat(20), "d".repeat(5));
    // Page segments are 36, 36, 36 and 21 chars long
    const chunks = new PromptChunker(schema, { size: budgetFor(80), unit: "chars" }).chunk(doc);

    expect(chunks.map((c) => c.pageIndices)).toEqual([[0, 1], [2, 3]]);
    for (const span of doc.spans) {
      expect(
        chunks.some((c) => c.start <= span.start && span.end <= c.end),
      ).toBe(true);
    }
  });

  it("should reconstruct the document and stay within budget", () => {
    const doc = documentOf(
      "Registration Mark AB1234 ".repeat(7),
      "保單號碼 Policy Number: MP-001",
      "",
      "Excess: HKD 5,000 *** ".repeat(12),
      "end",
    );
    const size = budgetFor(90);
    const chunks = new PromptChunker(schema, { size, unit: "chars" }).chunk(doc);

    expect(chunks.length).toBeGreaterThan(3);
    expect(chunks.map((c) => c.text).join("")).toBe(doc.text);
    chunks.forEach((chunk, i) => {
      expect(chunk.index).toBe(i);
      expect(chunk.text.length).toBeGreaterThan(0);
      expect(chunk.start).toBe(i === 0 ? 0 : chunks[i - 1].end);
    });
    expectWithinBudget(chunks, size);
  });

  it("should cut an oversized page after the last whitespace", () => {
    const doc = documentOf("alpha ".repeat(30));
    const chunks = new PromptChunker(schema, { size: budgetFor(60), unit: "chars" }).chunk(doc);

    expect(chunks[0].text).toBe("--- Page 1 ---\n" + "alpha ".repeat(7));
    for (const chunk of chunks.slice(0, -1)) {
      expect(chunk.text).toMatch(/\s$/);
      expect(chunk.text.length).toBeLessThanOrEqual(60);
    }
    expect(chunks.map((c) => c.text).join("")).toBe(doc.text);
  });

  it("should hard-cut text without whitespace", () => {
    const doc = documentOf("x".repeat(200));
    const chunks = new PromptChunker(schema, { size: budgetFor(60), unit: "chars" }).chunk(doc);

    expect(chunks.map((c) => c.text.length)).toEqual([15, 60, 60, 60, 21]);
    expect(chunks.every((c) => c.pageIndices.length === 1)).toBe(true);
  });

  it("should not split a surrogate pair on a hard cut", () => {
    // Delimiter ends at offset 15; the pair sits at offsets 74-75
    const doc = documentOf("x".repeat(59) + "😀" + "x".repeat(10));
    const chunks = new PromptChunker(schema, { size: budgetFor(60), unit: "chars" }).chunk(doc);

    expect(chunks[1].text).toBe("x".repeat(59));
    expect(chunks[2].text.startsWith("😀")).toBe(true);
  });

  it("should widen the part header when there are ten or more chunks", () => {
    const doc = documentOf(...Array.from({ length: 12 }, () => "policy!!"));
    const size = budgetFor(30);
    const chunks = new PromptChunker(schema, { size, unit: "chars" }).chunk(doc);

    expect(chunks).toHaveLength(12);
    expect(chunks[11].prompt.user).toContain("(part 12 of 12)");
    expectWithinBudget(chunks, size);
  });

  it("should measure token budgets in estimated tokens", () => {
    const doc = documentOf("Premium 1,234.00 ".repeat(40), "Excess 500 ".repeat(40));
    const size = Math.ceil(budgetFor(0) / 4) + 50;
    const chunks = new PromptChunker(schema, { size, unit: "tokens" }).chunk(doc);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(promptSize(chunk.retryPrompt, "tokens")).toBeLessThanOrEqual(size);
    }
    expect(chunks.map((c) => c.text).join("")).toBe(doc.text);
  });

  it("should be deterministic", () => {
    const doc = documentOf("one two three ".repeat(20), "four five ".repeat(20));
    const chunker = new PromptChunker(schema, { size: budgetFor(70), unit: "chars" });

    expect(chunker.chunk(doc)).toEqual(chunker.chunk(doc));
  });

  it("should add notes for Chinese text and redaction markers", () => {
    const chunker = new PromptChunker(schema, { size: 100_000, unit: "chars" });

    const [plain] = chunker.chunk(documentOf("Vehicle Make: Honda"));
    const [chinese] = chunker.chunk(documentOf("車輛 Vehicle"));
    const [redacted] = chunker.chunk(documentOf("HKID: ***"));

    expect(plain.prompt.user).not.toContain("Note:");
    expect(chinese.prompt.user).toContain(CHINESE_NOTE);
    expect(redacted.prompt.user).toContain(REDACTION_NOTE);
    expect(redacted.retryPrompt.user.endsWith(STRICT_RETRY_SUFFIX)).toBe(true);
    expect(redacted.prompt.user.endsWith(STRICT_RETRY_SUFFIX)).toBe(false);
  });

  it("should return no chunks for empty text", () => {
    const empty: DocumentText = { pages: [], spans: [], text: "" };
    expect(new PromptChunker(schema, { size: 100_000, unit: "chars" }).chunk(empty)).toEqual([]);
  });

  it("should reject budgets that cannot hold the instructions", () => {
    expect(() => new PromptChunker(schema, { size: 100, unit: "chars" })).toThrow(
      ConfigurationError,
    );
  });
});
