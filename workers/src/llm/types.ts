/**
 * LLM Provider Types
 *
 * Abstractions for the OCR and text-completion providers (OVHcloud, Mistral, Ollama).
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";

/**
 * Chat message format (OpenAI-compatible)
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Skip cache lookup/write for this request */
  skipCache?: boolean;
  /** Cache folder prefix (e.g. "ocr", "extract") */
  cachePrefix?: string;
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
  /** JSON schema response format for structured outputs */
  responseFormat?: {
    type: "json_schema" | "json_object";
    json_schema?: {
      name: string;
      strict?: boolean;
      schema: Record<string, unknown>;
    };
  };
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    pages?: number;
  };
  cached?: boolean;
}

/**
 * Text completion provider (OpenAI-compatible chat endpoints)
 */
export interface TextProvider {
  name: string;

  text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

/**
 * Document OCR provider: reads one rendered page and returns its text
 */
export interface OcrProvider {
  name: string;

  ocr(
    content: Uint8Array,
    mimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

export const TEXT_PROVIDERS = ["ovhcloud", "mistral", "ollama"] as const;
export type TextProviderName = (typeof TEXT_PROVIDERS)[number];

/** Pages reach OCR as single-page PDFs, which only the Mistral OCR API reads */
export const OCR_PROVIDERS = ["mistral-ocr"] as const;
export type OcrProviderName = (typeof OCR_PROVIDERS)[number];

export interface TextModelConfig {
  provider: TextProviderName;
  endpoint: string;
  model: string;
  numCtx: number;
}

export interface OcrModelConfig {
  provider: OcrProviderName;
  endpoint: string;
  model: string;
}

/**
 * Global LLM configuration
 */
export interface LLMConfig {
  cache: {
    enabled: boolean;
    dir: string;
  };
  ocr: OcrModelConfig;
  text: TextModelConfig;
}

const OVH_ENDPOINT =
  "https://oai.endpoints.kepler.ai.cloud.ovh.net/v1/chat/completions";
const MISTRAL_CHAT_ENDPOINT = "https://api.mistral.ai/v1/chat/completions";
const MISTRAL_OCR_ENDPOINT = "https://api.mistral.ai/v1/ocr";
const OLLAMA_ENDPOINT = "http://localhost:11434/v1/chat/completions";

const TEXT_DEFAULTS: Record<TextProviderName, { endpoint: string; model: string }> = {
  ovhcloud: {
    endpoint: OVH_ENDPOINT,
    model: "Mistral-Small-3.2-24B-Instruct-2506",
  },
  mistral: { endpoint: MISTRAL_CHAT_ENDPOINT, model: "mistral-small-latest" },
  ollama: { endpoint: OLLAMA_ENDPOINT, model: "mistral-small3.2" },
};

const emptyAsUnset = (value: unknown) => (value === "" ? undefined : value);

const llmEnvSchema = z.object({
  LLM_CACHE_ENABLED: z.preprocess(emptyAsUnset, z.enum(["true", "false"]).default("false")),
  LLM_CACHE_DIR: z.preprocess(emptyAsUnset, z.string().default("/app/cache")),
  LLM_NUM_CTX: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(8192)),
  LLM_OCR_PROVIDER: z.preprocess(
    emptyAsUnset,
    z
      .enum(OCR_PROVIDERS, {
        errorMap: () => ({
          message:
            "OCR reads pages as single-page PDFs; the only supported provider is mistral-ocr",
        }),
      })
      .default("mistral-ocr"),
  ),
  LLM_OCR_ENDPOINT: z.preprocess(emptyAsUnset, z.string().url().optional()),
  LLM_OCR_MODEL: z.preprocess(emptyAsUnset, z.string().optional()),
  LLM_TEXT_PROVIDER: z.preprocess(
    emptyAsUnset,
    z
      .enum(TEXT_PROVIDERS, {
        errorMap: () => ({
          message: `expected one of ${TEXT_PROVIDERS.join(", ")}`,
        }),
      })
      .default("ovhcloud"),
  ),
  LLM_TEXT_ENDPOINT: z.preprocess(emptyAsUnset, z.string().url().optional()),
  LLM_TEXT_MODEL: z.preprocess(emptyAsUnset, z.string().optional()),
});

/**
 * Get default configuration from environment.
 * Throws ConfigurationError listing every invalid variable.
 */
export function getDefaultConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const parsed = llmEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid LLM configuration: ${details}`);
  }

  const vars = parsed.data;
  const textDefaults = TEXT_DEFAULTS[vars.LLM_TEXT_PROVIDER];

  return {
    cache: {
      enabled: vars.LLM_CACHE_ENABLED === "true",
      dir: vars.LLM_CACHE_DIR,
    },
    // Page fallback; mistral-ocr reads single-page PDFs directly
    ocr: {
      provider: vars.LLM_OCR_PROVIDER,
      endpoint: vars.LLM_OCR_ENDPOINT ?? MISTRAL_OCR_ENDPOINT,
      model: vars.LLM_OCR_MODEL ?? "mistral-ocr-latest",
    },
    // Structured extraction
    text: {
      provider: vars.LLM_TEXT_PROVIDER,
      endpoint: vars.LLM_TEXT_ENDPOINT ?? textDefaults.endpoint,
      model: vars.LLM_TEXT_MODEL ?? textDefaults.model,
      numCtx: vars.LLM_NUM_CTX,
    },
  };
}
