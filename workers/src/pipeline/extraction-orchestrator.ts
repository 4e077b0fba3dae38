/**
 * ExtractionOrchestrator
 *
 * Sends every chunk to the completion model (bounded concurrency, one
 * timeout per request), parses the answers and merges them by chunk index.
 * A chunk gets one retry: with the stricter prompt after an unparseable
 * answer, with the same prompt after a transport error or timeout. A chunk
 * that fails twice is reported, never thrown.
 */

import { RunAbortedError, describeError } from "../errors.js";
import type { PolicySchema } from "../schema/policy-schema.js";
import type {
  ChunkFailure,
  CompletionModel,
  ExtractionChunk,
  MergedRecord,
  RawExtractionResult,
} from "../types.js";
import { mapWithConcurrency, withTimeout } from "./concurrency.js";
import { mergeResults } from "./field-merge.js";
import { parseExtractionResponse } from "./response-parser.js";

const MAX_ATTEMPTS = 2;

export interface OrchestratorOptions {
  /** maxTokens for each completion */
  responseBudget: number;
  concurrency: number;
  timeoutMs: number;
}

export interface OrchestrationResult {
  merged: MergedRecord;
  results: RawExtractionResult[];
  failures: ChunkFailure[];
}

export class ExtractionOrchestrator {
  constructor(
    private model: CompletionModel,
    private schema: PolicySchema,
    private options: OrchestratorOptions,
  ) {}

  async run(
    chunks: readonly ExtractionChunk[],
    options: { signal?: AbortSignal } = {},
  ): Promise<OrchestrationResult> {
    const results = await mapWithConcurrency(
      chunks,
      this.options.concurrency,
      (chunk) => this.extractChunk(chunk, options.signal),
      options.signal,
    );
    results.sort((a, b) => a.chunkIndex - b.chunkIndex);

    const failures: ChunkFailure[] = results
      .filter((result) => result.fields === null)
      .map((result) => ({
        chunkIndex: result.chunkIndex,
        reason: result.parseError ?? "No usable response",
      }));

    return { merged: mergeResults(results), results, failures };
  }

  private async extractChunk(
    chunk: ExtractionChunk,
    signal: AbortSignal | undefined,
  ): Promise<RawExtractionResult> {
    const label = `Chunk ${chunk.index + 1}`;
    let prompt = chunk.prompt;
    let lastError = "";

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let response: string;
      try {
        response = await withTimeout(
          (requestSignal) =>
            this.model.complete(prompt, {
              responseBudget: this.options.responseBudget,
              signal: requestSignal,
            }),
          this.options.timeoutMs,
          signal,
          `${label} completion`,
        );
      } catch (error) {
        if (error instanceof RunAbortedError) throw error;
        lastError = describeError(error);
        console.warn(
          `[ExtractionOrchestrator] ${label}: attempt ${attempt}/${MAX_ATTEMPTS} failed: ${lastError}`,
        );
        continue;
      }

      const parsed = parseExtractionResponse(response, this.schema);
      if (parsed.status !== "failed") {
        if (parsed.status === "partial") {
          console.warn(`[ExtractionOrchestrator] ${label}: ${parsed.error}`);
        }
        return {
          chunkIndex: chunk.index,
          fields: parsed.fields,
          parseError: parsed.status === "partial" ? parsed.error : null,
          attempts: attempt,
        };
      }

      lastError = parsed.error;
      prompt = chunk.retryPrompt;
      console.warn(
        `[ExtractionOrchestrator] ${label}: attempt ${attempt}/${MAX_ATTEMPTS} unparseable (${response.length} chars)`,
      );
    }

    console.error(
      `[ExtractionOrchestrator] ${label}: giving up after ${MAX_ATTEMPTS} attempts`,
    );
    return {
      chunkIndex: chunk.index,
      fields: null,
      parseError: lastError,
      attempts: MAX_ATTEMPTS,
    };
  }
}
