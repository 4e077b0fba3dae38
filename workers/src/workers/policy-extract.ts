/**
 * PolicyExtract Worker
 *
 * Runs one extraction per job. The PDF travels base64-encoded in the job
 * data; the result is the same body POST /extract returns.
 */

import { Worker, Job, UnrecoverableError } from "bullmq";
import { z } from "zod";
import { connection, EXTRACTION_QUEUE_NAME } from "../queues.js";
import { EmptyDocumentError } from "../errors.js";
import type { PolicyExtractor } from "../pipeline/policy-extractor.js";
import { toExtractionResponse, type ExtractionResponse } from "../response.js";

export const policyExtractJobSchema = z.object({
  documentId: z.string().min(1),
  filename: z.string().optional(),
  pdfBase64: z.string().min(1),
});

export type PolicyExtractJobData = z.infer<typeof policyExtractJobSchema>;

/**
 * PolicyExtract job processor
 */
export async function processPolicyExtractJob(
  job: Pick<Job<PolicyExtractJobData>, "id" | "data">,
  extractor: Pick<PolicyExtractor, "extract">,
): Promise<ExtractionResponse> {
  const { documentId, filename, pdfBase64 } = job.data;
  const pdfBytes = new Uint8Array(Buffer.from(pdfBase64, "base64"));

  console.log(
    `[PolicyExtract] Processing document ${documentId}` +
      (filename ? ` (${filename})` : "") +
      `, ${pdfBytes.byteLength} bytes`,
  );

  try {
    const outcome = await extractor.extract(pdfBytes);
    return toExtractionResponse(outcome);
  } catch (error) {
    if (error instanceof EmptyDocumentError) {
      throw new UnrecoverableError(error.message);
    }
    throw error;
  }
}

export function createPolicyExtractWorker(
  extractor: Pick<PolicyExtractor, "extract">,
  concurrency: number,
): Worker<PolicyExtractJobData, ExtractionResponse> {
  const worker = new Worker<PolicyExtractJobData, ExtractionResponse>(
    EXTRACTION_QUEUE_NAME,
    async (job) => processPolicyExtractJob(job, extractor),
    {
      connection,
      concurrency,
    },
  );

  worker.on("completed", (job) => {
    console.log(`[PolicyExtract] Job ${job.id} completed`);
  });

  worker.on("failed", (job, error) => {
    console.error(`[PolicyExtract] Job ${job?.id} failed:`, error.message);
  });

  return worker;
}
