import type { LLMClient } from "./index.js";
import type { ChunkPrompt, CompletionModel } from "../types.js";

/**
 * Structured extraction requests, sent to the text provider in JSON mode.
 */
export class LlmCompletionModel implements CompletionModel {
  constructor(private client: Pick<LLMClient, "chat">) {}

  async complete(
    prompt: ChunkPrompt,
    options: { responseBudget: number; signal?: AbortSignal },
  ): Promise<string> {
    const response = await this.client.chat(prompt.system, prompt.user, {
      responseFormat: { type: "json_object" },
      temperature: 0,
      maxTokens: options.responseBudget,
      cachePrefix: "extract",
      signal: options.signal,
    });
    return response.content;
  }
}
