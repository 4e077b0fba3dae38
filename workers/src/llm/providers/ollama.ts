/**
 * Local extraction provider targeting an Ollama instance.
 *
 * Ollama serves one generation at a time well, so extraction calls are
 * serialized; a call whose run was aborted while it waited is dropped
 * before it reaches the server.
 */

import type { ChatMessage, ChatRequestOptions, ChatResponse } from "../types.js";
import { GenericProvider } from "./generic.js";

export class OllamaProvider extends GenericProvider {
  name = "ollama";

  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    endpoint: string,
    defaultModel: string,
    private numCtx: number,
  ) {
    super(endpoint, defaultModel, "");
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: options?.model || this.defaultModel,
      messages,
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 4096,
      stream: false,
      keep_alive: "5m",
      // Prompt chunks are sized for this window
      options: { num_ctx: this.numCtx },
    };

    const format = options?.responseFormat;
    if (format?.type === "json_schema" && format.json_schema) {
      body.format = format.json_schema.schema;
    } else if (format?.type === "json_object") {
      body.format = "json";
    }

    return body;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const run = async (): Promise<ChatResponse> => {
      if (options?.signal?.aborted) {
        console.warn("[Ollama] Dropping queued request: run was aborted");
        options.signal.throwIfAborted();
      }
      return this._doChat(messages, options);
    };

    const next = this.pending.then(run);
    // Keep the chain alive whatever this call's outcome
    this.pending = next.catch(() => undefined);
    return next;
  }
}
