/**
 * Joins resolved pages into one document text with page delimiters,
 * keeping the offset range and acquisition method of every page.
 */

import { EmptyDocumentError } from "../errors.js";
import type { DocumentText, Page, PageSpan } from "../types.js";

export function pageDelimiter(pageIndex: number): string {
  return `--- Page ${pageIndex + 1} ---\n`;
}

export function assembleDocumentText(pages: readonly Page[]): DocumentText {
  if (pages.length === 0) {
    throw new EmptyDocumentError("Document has no pages");
  }

  const ordered = [...pages].sort((a, b) => a.index - b.index);

  if (ordered.every((page) => page.text.trim().length === 0)) {
    throw new EmptyDocumentError();
  }

  const spans: PageSpan[] = [];
  let text = "";
  for (const page of ordered) {
    const start = text.length;
    text += `${pageDelimiter(page.index)}${page.text}\n`;
    spans.push(
      Object.freeze({
        pageIndex: page.index,
        start,
        end: text.length,
        method: page.method,
      }),
    );
  }

  console.log(
    `[DocumentTextAssembler] ${ordered.length} page(s), ${text.length} chars (` +
      `${ordered.filter((p) => p.method === "ocr").length} via OCR)`,
  );

  return Object.freeze({
    pages: Object.freeze(ordered),
    spans: Object.freeze(spans),
    text,
  });
}
