/**
 * PageTextResolver
 *
 * Decides per page whether the PDF text layer can be trusted. Scanned pages
 * usually carry no text layer, or one made of stray glyphs, so those pages
 * are rendered and sent to OCR instead. At most one OCR call per page.
 */

import type { PageTextPolicy } from "../config.js";
import { RunAbortedError, describeError } from "../errors.js";
import type { OcrEngine, Page, PageSource } from "../types.js";
import { withTimeout } from "./concurrency.js";

const ALNUM = /[\p{L}\p{N}]/u;

/**
 * Share of letters and digits among non-whitespace characters (0 when there are none).
 */
export function alnumRatio(text: string): number {
  let visible = 0;
  let alnum = 0;
  for (const char of text) {
    if (/\s/.test(char)) continue;
    visible++;
    if (ALNUM.test(char)) alnum++;
  }
  return visible === 0 ? 0 : alnum / visible;
}

export class PageTextResolver {
  constructor(
    private ocr: OcrEngine,
    private policy: PageTextPolicy,
  ) {}

  isTrustworthy(nativeText: string): boolean {
    const trimmed = nativeText.trim();
    return (
      trimmed.length >= this.policy.minNativeChars &&
      alnumRatio(trimmed) >= this.policy.minAlnumRatio
    );
  }

  async resolve(
    source: PageSource,
    options: { signal?: AbortSignal } = {},
  ): Promise<Page> {
    const { index, nativeText } = source;

    if (this.isTrustworthy(nativeText)) {
      return freezePage({
        index,
        nativeText,
        ocrText: null,
        ocrError: null,
        text: nativeText,
        method: "native",
        confidence: alnumRatio(nativeText),
      });
    }

    console.log(
      `[PageTextResolver] Page ${index + 1}: native text not trusted (${nativeText.trim().length} chars), running OCR`,
    );

    let ocrText = "";
    let ocrError: string | null = null;
    try {
      ocrText = await withTimeout(
        async (signal) => {
          const image = await source.renderImage();
          return this.ocr.recognize(image, { signal });
        },
        this.policy.ocrTimeoutMs,
        options.signal,
        `Page ${index + 1} OCR`,
      );
    } catch (error) {
      if (error instanceof RunAbortedError) throw error;
      ocrError = describeError(error);
      console.warn(
        `[PageTextResolver] Page ${index + 1}: OCR failed, keeping native text: ${ocrError}`,
      );
    }

    // Fall back to the untrusted text layer only when OCR produced nothing
    const useOcr =
      ocrText.trim().length > 0 || nativeText.trim().length === 0;
    const text = useOcr ? ocrText : nativeText;

    return freezePage({
      index,
      nativeText,
      ocrText,
      ocrError,
      text,
      method: useOcr ? "ocr" : "native",
      confidence: alnumRatio(text),
    });
  }
}

function freezePage(page: Page): Page {
  return Object.freeze(page);
}
