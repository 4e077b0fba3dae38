/**
 * Single entry point for every model call made by the extraction pipeline.
 * Routes page OCR to Mistral OCR and structured extraction to the configured
 * chat provider (OVHcloud, Mistral, Ollama), and manages the response cache.
 */

import type {
  TextProvider,
  OcrProvider,
  ChatRequestOptions,
  ChatResponse,
  LLMConfig,
  OcrModelConfig,
  TextModelConfig,
} from "./types.js";
import { getDefaultConfig } from "./types.js";
import { GenericProvider } from "./providers/generic.js";
import { MistralProvider } from "./providers/mistral.js";
import { OllamaProvider } from "./providers/ollama.js";
import { MistralOcrProvider } from "./providers/mistral-ocr.js";
import { LLMCache, type CacheRequest } from "./cache.js";
import { ConfigurationError } from "../errors.js";

function requireKey(env: NodeJS.ProcessEnv, name: string, provider: string) {
  const key = env[name];
  if (!key) {
    throw new ConfigurationError(`${name} is required for ${provider} provider`);
  }
  return key;
}

/**
 * Instantiate the text provider named by the model configuration,
 * injecting the API key it needs.
 */
export function createTextProvider(
  modelConfig: TextModelConfig,
  env: NodeJS.ProcessEnv = process.env,
): TextProvider {
  switch (modelConfig.provider) {
    case "ollama":
      return new OllamaProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.numCtx,
      );
    case "mistral":
      return new MistralProvider(
        modelConfig.endpoint,
        modelConfig.model,
        requireKey(env, "MISTRAL_API_KEY", "Mistral"),
      );
    case "ovhcloud":
      return new GenericProvider(
        modelConfig.endpoint,
        modelConfig.model,
        requireKey(env, "OVH_AI_API_KEY", "OVHcloud"),
      );
  }
}

export function createOcrProvider(
  modelConfig: OcrModelConfig,
  env: NodeJS.ProcessEnv = process.env,
): OcrProvider {
  switch (modelConfig.provider) {
    case "mistral-ocr":
      return new MistralOcrProvider(
        modelConfig.endpoint,
        modelConfig.model,
        requireKey(env, "MISTRAL_API_KEY", "Mistral"),
      );
  }
}

export class LLMClient {
  private ocrProvider: OcrProvider;
  private textProvider: TextProvider;
  private cache: LLMCache | null;
  private config: LLMConfig;

  constructor(
    config?: Partial<LLMConfig>,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.config = { ...getDefaultConfig(env), ...config };

    this.ocrProvider = createOcrProvider(this.config.ocr, env);
    this.textProvider = createTextProvider(this.config.text, env);

    this.cache = this.config.cache.enabled
      ? new LLMCache(this.config.cache.dir)
      : null;
  }

  get ocrModel(): string {
    return this.config.ocr.model;
  }

  get textModel(): string {
    return this.config.text.model;
  }

  /**
   * Transcribe one rendered page (an image or a single-page PDF).
   */
  async ocr(
    content: Uint8Array,
    mimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.ocr.model;
    return this._cached(
      { content, mimeType },
      model,
      options?.cachePrefix || "ocr",
      options,
      () => this.ocrProvider.ocr(content, mimeType, { ...options, model }),
    );
  }

  /**
   * Text completion used for structured field extraction.
   */
  async chat(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.text.model;
    return this._cached(
      { systemPrompt, userPrompt },
      model,
      options?.cachePrefix || "chat",
      options,
      () =>
        this.textProvider.text(systemPrompt, userPrompt, {
          ...options,
          model,
        }),
    );
  }

  private async _cached(
    request: CacheRequest,
    model: string,
    prefix: string,
    options: ChatRequestOptions | undefined,
    call: () => Promise<ChatResponse>,
  ): Promise<ChatResponse> {
    const cache = options?.skipCache ? null : this.cache;

    if (cache) {
      const cached = await cache.get(request, model, prefix);
      if (cached) {
        console.log(`[LLMClient] Cache hit for model ${model} (${prefix})`);
        return cached;
      }
    }

    const response = await call();

    if (cache) {
      await cache.set(request, model, response, prefix);
    }

    return response;
  }
}

export type { ChatResponse, ChatRequestOptions } from "./types.js";
