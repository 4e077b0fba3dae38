/**
 * Local filesystem cache for LLM request/response pairs.
 * Used during development to avoid re-running OCR and extraction calls
 * for pages and chunks that were already processed.
 * Cache key: <prefix>/<model id>/<prompt hash>/<content hash>.json
 */

import { createHash } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join, dirname } from "path";
import { z } from "zod";
import type { ChatResponse } from "./types.js";

const cachedResponseSchema = z.object({
  content: z.string(),
  model: z.string(),
  usage: z
    .object({
      promptTokens: z.number(),
      completionTokens: z.number(),
      totalTokens: z.number(),
      pages: z.number().optional(),
    })
    .optional(),
});

export type CacheRequest =
  | {
      systemPrompt: string;
      userPrompt: string;
    }
  | {
      content: Uint8Array;
      mimeType: string;
    };

/**
 * Generates a SHA-256 hash truncated to 16 characters for cache key derivation.
 */
function hash(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Derives a deterministic cache key from the model identifier and the request (prompts or page bytes).
 */
function getCacheKey(
  request: CacheRequest,
  model: string,
): { modelId: string; promptHash: string; contentHash: string } {
  let promptHash: string;
  let contentHash: string;

  if ("content" in request) {
    // Document OCR takes no prompt; pages are grouped by mime type
    promptHash = hash(request.mimeType);
    contentHash = hash(
      `${request.mimeType}:${Buffer.from(request.content).toString("base64")}`,
    );
  } else {
    promptHash = hash(request.systemPrompt);
    contentHash = hash(request.userPrompt);
  }

  // Sanitize model name for filesystem
  const modelId = model.replace(/[^a-zA-Z0-9.-]/g, "_");

  return { modelId, promptHash, contentHash };
}

/**
 * Manages the persistence and retrieval of LLM responses on the local filesystem.
 */
export class LLMCache {
  constructor(private cacheDir: string) {}

  /**
   * Constructs the physical path for a cache file.
   */
  private getCachePath(
    prefix: string,
    modelId: string,
    promptHash: string,
    contentHash: string,
  ): string {
    const parts = [
      this.cacheDir,
      prefix,
      modelId,
      promptHash,
      `${contentHash}.json`,
    ];
    return join(...parts.filter((path) => path));
  }

  /**
   * Retrieves a cached LLM response if it exists and matches the deterministic request parameters.
   */
  async get(
    request: CacheRequest,
    model: string,
    prefix: string = "default",
  ): Promise<ChatResponse | null> {
    const { modelId, promptHash, contentHash } = getCacheKey(request, model);
    const cachePath = this.getCachePath(
      prefix,
      modelId,
      promptHash,
      contentHash,
    );

    let data: unknown;
    try {
      data = JSON.parse(await readFile(cachePath, "utf-8"));
    } catch {
      // Missing or unreadable entry
      return null;
    }

    const cached = cachedResponseSchema.safeParse(data);
    if (!cached.success) {
      console.warn(`[LLMCache] Ignoring malformed cache entry ${cachePath}`);
      return null;
    }
    return { ...cached.data, cached: true };
  }

  /**
   * Serializes and writes an LLM response to the disk cache.
   */
  async set(
    request: CacheRequest,
    model: string,
    response: ChatResponse,
    prefix: string = "default",
  ): Promise<void> {
    const { modelId, promptHash, contentHash } = getCacheKey(request, model);
    const cachePath = this.getCachePath(
      prefix,
      modelId,
      promptHash,
      contentHash,
    );

    // Create directory structure
    await mkdir(dirname(cachePath), { recursive: true });

    // Write response
    await writeFile(cachePath, JSON.stringify(response, null, 2), "utf-8");

    console.log(`[LLMCache] Cached response to ${cachePath}`);
  }
}

export { getCacheKey, hash };
