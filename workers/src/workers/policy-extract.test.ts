/**
 * Validation Suite: policy-extract worker
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Job } from "bullmq";
import type { PolicyExtractJobData } from "./policy-extract.js";
import type { ExtractionOutcome } from "../types.js";

const mocks = vi.hoisted(() => ({
  workerOn: vi.fn(),
  workerArgs: vi.fn(),
}));

// Mock queues
vi.mock("bullmq", () => ({
  Worker: class {
    constructor(...args: unknown[]) {
      mocks.workerArgs(...args);
    }
    on(...args: unknown[]) {
      mocks.workerOn(...args);
    }
    close() {}
  },
  UnrecoverableError: class extends Error {
    name = "UnrecoverableError";
  },
}));

vi.mock("../queues.js", () => ({
  connection: {},
  EXTRACTION_QUEUE_NAME: "policy-extract",
}));

// Import after mocking
const { processPolicyExtractJob, createPolicyExtractWorker } = await import(
  "./policy-extract.js"
);
const { UnrecoverableError } = await import("bullmq");
const { EmptyDocumentError } = await import("../errors.js");

function createJob(
  data: PolicyExtractJobData,
): Pick<Job<PolicyExtractJobData>, "id" | "data"> {
  return { id: "job-1", data };
}

const outcome: ExtractionOutcome = {
  data: { vehicle: { make: "Toyota" } },
  report: { isValid: true, errors: [], missingFields: [], failedChunks: [] },
  pages: [{ pageIndex: 0, method: "native", confidence: 1 }],
  chunkCount: 1,
  warnings: [],
};

describe("policy-extract worker", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("should decode the base64 payload and return the response body", async () => {
    const extract = vi.fn().mockResolvedValue(outcome);

    const result = await processPolicyExtractJob(
      createJob({ documentId: "doc-1", pdfBase64: Buffer.from("%PDF").toString("base64") }),
      { extract },
    );

    expect(Array.from(extract.mock.calls[0][0])).toEqual([37, 80, 68, 70]);
    expect(result).toEqual({
      success: true,
      data: { vehicle: { make: "Toyota" } },
      validation: { is_valid: true, errors: [], missing_fields: [], failed_chunks: [] },
    });
  });

  it("should not retry documents without text", async () => {
    const extract = vi.fn().mockRejectedValue(new EmptyDocumentError());

    const error = await processPolicyExtractJob(
      createJob({ documentId: "doc-2", pdfBase64: "JVBERg==" }),
      { extract },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnrecoverableError);
    expect(error).toHaveProperty("message", "Unable to extract text from document");
  });

  it("should rethrow other errors for BullMQ to record", async () => {
    const extract = vi.fn().mockRejectedValue(new Error("disk full"));

    await expect(
      processPolicyExtractJob(createJob({ documentId: "doc-3", pdfBase64: "JVBERg==" }), {
        extract,
      }),
    ).rejects.toThrow("disk full");
  });

  it("should create a worker on the extraction queue", () => {
    createPolicyExtractWorker({ extract: vi.fn() }, 3);

    expect(mocks.workerArgs).toHaveBeenCalledWith(
      "policy-extract",
      expect.any(Function),
      { connection: {}, concurrency: 3 },
    );
    expect(mocks.workerOn.mock.calls.map((call) => call[0])).toEqual([
      "completed",
      "failed",
    ]);
  });
});
