/**
 * OCR fallback for pages without a usable text layer, backed by the
 * Mistral OCR provider.
 */

import type { LLMClient } from "./index.js";
import type { OcrEngine, PageImage } from "../types.js";

export class LlmOcrEngine implements OcrEngine {
  constructor(private client: Pick<LLMClient, "ocr">) {}

  async recognize(
    image: PageImage,
    options: { signal?: AbortSignal } = {},
  ): Promise<string> {
    const response = await this.client.ocr(image.data, image.mimeType, {
      cachePrefix: "ocr",
      signal: options.signal,
    });

    console.log(
      `[LlmOcr] Page ${image.pageIndex + 1}: ${response.content.length} chars` +
        (response.cached ? " (cached)" : ""),
    );
    return response.content;
  }
}
