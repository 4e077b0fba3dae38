/**
 * Worker Entry Point
 *
 * Loads configuration and the policy schema, then starts the HTTP server
 * and the queue worker.
 */

import "dotenv/config";
import { loadPipelineConfig } from "./config.js";
import { loadPolicySchema } from "./schema/policy-schema.js";
import { LLMClient } from "./llm/index.js";
import { getDefaultConfig } from "./llm/types.js";
import { LlmOcrEngine } from "./llm/ocr-engine.js";
import { LlmCompletionModel } from "./llm/completion-model.js";
import { PdfPageDecoder } from "./pdf/pdf-pages.js";
import { PolicyExtractor } from "./pipeline/policy-extractor.js";
import { createPolicyExtractWorker } from "./workers/policy-extract.js";
import { closeQueues, extractionQueue } from "./queues.js";
import { createApp } from "./app.js";
import { describeError } from "./errors.js";

const PORT = Number(process.env.PORT || 8080);
const WORKER_VERSION = process.env.WORKER_VERSION || "local-dev";
const WORKER_CONCURRENCY = Number(process.env.WORKER_CONCURRENCY || 2);

async function main(): Promise<void> {
  // Configuration errors are fatal at startup
  const config = loadPipelineConfig();
  const schema = await loadPolicySchema(config.schemaPath);
  const llmConfig = getDefaultConfig();
  const client = new LLMClient(llmConfig);

  const extractor = new PolicyExtractor({
    decoder: new PdfPageDecoder(),
    ocr: new LlmOcrEngine(client),
    model: new LlmCompletionModel(client),
    schema,
    config,
  });

  const worker = createPolicyExtractWorker(extractor, WORKER_CONCURRENCY);
  const app = createApp({
    extractor,
    queue: extractionQueue,
    version: WORKER_VERSION,
  });

  const server = app.listen(PORT, () => {
    console.log(`[Server] Worker listening on port ${PORT}`);
    console.log(`[Server] Version: ${WORKER_VERSION}`);
    console.log(`[Server] Schema: ${schema.title} (${schema.fields.length} fields)`);
    console.log(`[Server] ocr.provider: ${llmConfig.ocr.provider}`);
    console.log(`[Server] ocr.model: ${llmConfig.ocr.model}`);
    console.log(`[Server] text.provider: ${llmConfig.text.provider}`);
    console.log(`[Server] text.model: ${llmConfig.text.model}`);
    console.log(`[Server] cache.enabled: ${llmConfig.cache.enabled}`);
    console.log(
      `[Server] chunk budget: ${config.chunkBudget.size} ${config.chunkBudget.unit}`,
    );
  });

  let shuttingDown = false;
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] Received ${signal}, shutting down gracefully...`);

    // Stop accepting new connections
    server.close();

    await worker.close();
    await closeQueues();

    console.log("[Server] Shutdown complete");
    process.exit(0);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[Server] Shutdown failed:", describeError(error));
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  process.on("uncaughtException", (error) => {
    console.error("[Server] Uncaught exception:", error);
    onSignal("uncaughtException");
  });

  process.on("unhandledRejection", (reason) => {
    console.error("[Server] Unhandled rejection:", reason);
  });
}

main().catch((error: unknown) => {
  console.error("[Server] Startup failed:", describeError(error));
  process.exit(1);
});
