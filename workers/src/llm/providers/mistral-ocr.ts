/**
 * Dedicated provider for the 'mistral-ocr' endpoint.
 * Sends the page (single-page PDF or image) straight to the OCR API and
 * returns the page markdown as plain text.
 */

import { z } from "zod";
import type {
  ChatRequestOptions,
  ChatResponse,
  OcrProvider,
} from "../types.js";
import { MistralRateLimiter } from "./mistral-rate-limiter.js";

type OcrDocument =
  | { type: "document_url"; document_url: string }
  | { type: "image_url"; image_url: string };

const ocrPayloadSchema = z.object({
  pages: z.array(z.object({ markdown: z.string().optional() })).optional(),
  model: z.string().optional(),
});

export class MistralOcrProvider implements OcrProvider {
  name = "mistral-ocr";

  constructor(
    private endpoint: string,
    private defaultModel: string,
    private apiKey: string,
  ) {}

  async ocr(
    content: Uint8Array,
    mimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const dataUrl = `data:${mimeType};base64,${Buffer.from(content).toString("base64")}`;
    const document: OcrDocument =
      mimeType === "application/pdf"
        ? { type: "document_url", document_url: dataUrl }
        : { type: "image_url", image_url: dataUrl };

    const model = options?.model || this.defaultModel;
    const body = JSON.stringify({ model, document });

    return MistralRateLimiter.getInstance().execute(async () => {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body,
        signal: options?.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(
          `${this.name} API error (${response.status}): ${error}`,
        );
      }

      const data = ocrPayloadSchema.parse(await response.json());
      const pages = data.pages ?? [];

      return {
        content: pages.map((page) => page.markdown ?? "").join("\n\n"),
        model: data.model || model,
        usage: {
          promptTokens: 0,
          completionTokens: 0,
          totalTokens: 0,
          pages: pages.length,
        },
      };
    }, Buffer.byteLength(body));
  }
}
