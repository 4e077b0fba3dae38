/**
 * Client-facing body shared by POST /extract and completed jobs.
 */

import type { ChunkFailure, ExtractionOutcome, FieldError, PolicyRecord } from "./types.js";

export interface ExtractionResponse {
  success: true;
  data: PolicyRecord;
  validation: {
    is_valid: boolean;
    errors: FieldError[];
    missing_fields: string[];
    failed_chunks: Array<{ chunk_index: number; reason: string }>;
  };
  warnings?: string[];
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
}

function toFailedChunk(failure: ChunkFailure) {
  return { chunk_index: failure.chunkIndex, reason: failure.reason };
}

export function toExtractionResponse(outcome: ExtractionOutcome): ExtractionResponse {
  const { report } = outcome;
  const response: ExtractionResponse = {
    success: true,
    data: outcome.data,
    validation: {
      is_valid: report.isValid,
      errors: report.errors.map((error) => ({ ...error })),
      missing_fields: [...report.missingFields],
      failed_chunks: report.failedChunks.map(toFailedChunk),
    },
  };
  if (outcome.warnings.length > 0) {
    response.warnings = [...outcome.warnings];
  }
  return response;
}
