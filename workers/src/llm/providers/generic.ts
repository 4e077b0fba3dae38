/**
 * OVHcloud AI Endpoints Provider
 *
 * Uses the OpenAI-compatible chat API (default model
 * Mistral-Small-3.2-24B-Instruct-2506). Base class of the Mistral and
 * Ollama chat providers.
 */

import { z } from "zod";
import type {
  TextProvider,
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";

// OpenAI-compatible chat completion body (only the parts we read)
const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullable().optional() })
          .optional(),
      }),
    )
    .optional(),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class GenericProvider implements TextProvider {
  name = "generic";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userPrompt },
    ];
    return this._chat(messages, options);
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const model = options?.model || this.defaultModel;

    const requestBody: Record<string, unknown> = {
      model,
      messages,
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 4096,
    };

    // Add response_format for structured outputs if provided
    if (options?.responseFormat) {
      requestBody.response_format = options.responseFormat;
    }

    return requestBody;
  }

  protected _getRequestHeaders(): Record<string, string> {
    const requestHeaders: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      requestHeaders["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return requestHeaders;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._doChat(messages, options);
  }

  protected async _doChat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    const requestBody = this._getRequestBody(messages, options);
    const requestHeaders = this._getRequestHeaders();

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: requestHeaders,
      body: JSON.stringify(requestBody),
      signal: options?.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error (${response.status}): ${error}`);
    }

    const data = chatCompletionSchema.parse(await response.json());

    return {
      content: data.choices?.[0]?.message?.content || "",
      model: data.model || model,
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  }
}
