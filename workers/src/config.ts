/**
 * Pipeline policy configuration, read once from the environment at startup.
 */

import { join } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { ChunkBudget } from "./types.js";

const DEFAULT_SCHEMA_PATH = join(
  process.cwd(),
  "workers",
  "schemas",
  "motor-policy.schema.json",
);

const pipelineEnvSchema = z.object({
  NATIVE_MIN_CHARS: z.coerce.number().int().nonnegative().default(100),
  NATIVE_MIN_ALNUM_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  PAGE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  CHUNK_BUDGET: z.coerce.number().int().positive().default(24_000),
  CHUNK_BUDGET_UNIT: z.enum(["chars", "tokens"]).default("chars"),
  RESPONSE_BUDGET_TOKENS: z.coerce.number().int().positive().default(4096),
  CHUNK_CONCURRENCY: z.coerce.number().int().positive().default(2),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  POLICY_SCHEMA_PATH: z.string().min(1).default(DEFAULT_SCHEMA_PATH),
});

export interface PageTextPolicy {
  /** Minimum trimmed native characters for a page to be trusted */
  minNativeChars: number;
  /** Minimum share of letters/digits among visible native characters */
  minAlnumRatio: number;
  ocrTimeoutMs: number;
}

export interface PipelineConfig {
  page: PageTextPolicy & { concurrency: number };
  chunkBudget: ChunkBudget;
  completion: {
    responseBudget: number;
    concurrency: number;
    timeoutMs: number;
  };
  schemaPath: string;
}

/**
 * Parses pipeline settings from environment variables.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const parsed = pipelineEnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid pipeline configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    page: {
      minNativeChars: vars.NATIVE_MIN_CHARS,
      minAlnumRatio: vars.NATIVE_MIN_ALNUM_RATIO,
      concurrency: vars.PAGE_CONCURRENCY,
      ocrTimeoutMs: vars.OCR_TIMEOUT_MS,
    },
    chunkBudget: {
      size: vars.CHUNK_BUDGET,
      unit: vars.CHUNK_BUDGET_UNIT,
    },
    completion: {
      responseBudget: vars.RESPONSE_BUDGET_TOKENS,
      concurrency: vars.CHUNK_CONCURRENCY,
      timeoutMs: vars.COMPLETION_TIMEOUT_MS,
    },
    schemaPath: vars.POLICY_SCHEMA_PATH,
  };
}
