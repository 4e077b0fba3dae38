/**
 * BullMQ connection and the policy extraction queue.
 */

import { Queue } from "bullmq";
import { Redis } from "ioredis";
import type { PolicyExtractJobData } from "./workers/policy-extract.js";
import type { ExtractionResponse } from "./response.js";

export const EXTRACTION_QUEUE_NAME = "policy-extract";

// Redis connection (shared by the queue and the worker)
export const connection = new Redis(
  process.env.REDIS_URL ?? "redis://localhost:6379",
  {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
    lazyConnect: true,
  },
);

connection.on("error", (err: Error) => {
  console.error("[Redis] Connection error:", err.message);
});

connection.on("connect", () => {
  console.log("[Redis] Connected");
});

export type ExtractionQueue = Queue<PolicyExtractJobData, ExtractionResponse>;

export const extractionQueue: ExtractionQueue = new Queue<
  PolicyExtractJobData,
  ExtractionResponse
>(EXTRACTION_QUEUE_NAME, {
  connection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: {
      age: 24 * 60 * 60, // Keep completed jobs for 24 hours
      count: 1000,
    },
    removeOnFail: {
      age: 7 * 24 * 60 * 60, // Keep failed jobs for 7 days
    },
  },
});

// Graceful shutdown
export async function closeQueues(): Promise<void> {
  await extractionQueue.close();
  await connection.quit();
  console.log("[Queues] Closed");
}
