/**
 * HTTP surface: synchronous extraction, queued jobs and health checks.
 */

import express, {
  type ErrorRequestHandler,
  type Request,
  type Response,
} from "express";
import { EmptyDocumentError, RunAbortedError, describeError } from "./errors.js";
import type { PolicyExtractor } from "./pipeline/policy-extractor.js";
import {
  toExtractionResponse,
  type ErrorResponse,
  type ExtractionResponse,
} from "./response.js";
import {
  policyExtractJobSchema,
  type PolicyExtractJobData,
} from "./workers/policy-extract.js";

const PDF_CONTENT_TYPES = ["application/pdf", "application/octet-stream"];
const MAX_PDF_SIZE = "20mb";

/** The parts of the BullMQ queue the routes use */
export interface ExtractionJobStore {
  add(name: string, data: PolicyExtractJobData): Promise<{ id?: string }>;
  getJob(id: string): Promise<
    | {
        id?: string;
        returnvalue: ExtractionResponse | null;
        failedReason?: string;
        getState(): Promise<string>;
      }
    | undefined
  >;
}

export interface AppOptions {
  extractor: Pick<PolicyExtractor, "extract">;
  /** Without a queue the /jobs routes answer 503 */
  queue?: ExtractionJobStore;
  version: string;
}

function contentType(req: Request): string {
  return (req.headers["content-type"] ?? "").split(";")[0].trim().toLowerCase();
}

function sendError(
  res: Response,
  status: number,
  body: Omit<ErrorResponse, "success">,
): void {
  const payload: ErrorResponse = { success: false, ...body };
  res.status(status).json(payload);
}

export function createApp({ extractor, queue, version }: AppOptions) {
  const app = express();

  // ==========================================================================
  // Health
  // ==========================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      version,
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  // ==========================================================================
  // Synchronous extraction
  // ==========================================================================

  app.post(
    "/extract",
    express.raw({ type: PDF_CONTENT_TYPES, limit: MAX_PDF_SIZE }),
    async (req: Request, res: Response) => {
      if (!PDF_CONTENT_TYPES.includes(contentType(req))) {
        sendError(res, 415, {
          error: "Expected a PDF body (Content-Type: application/pdf)",
        });
        return;
      }

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        sendError(res, 400, { error: "Empty request body" });
        return;
      }

      // Cancel the run if the client goes away before we answer
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          controller.abort(new Error("Client disconnected"));
        }
      });

      try {
        const outcome = await extractor.extract(new Uint8Array(body), {
          signal: controller.signal,
        });
        res.json(toExtractionResponse(outcome));
      } catch (error) {
        if (error instanceof EmptyDocumentError) {
          sendError(res, 422, { error: error.message, code: error.code });
          return;
        }
        if (error instanceof RunAbortedError) {
          console.warn("[Server] Extraction aborted: client disconnected");
          return;
        }
        console.error("[Server] Extraction failed:", describeError(error));
        sendError(res, 500, { error: "Extraction failed" });
      }
    },
  );

  // ==========================================================================
  // Queued extraction
  // ==========================================================================

  app.post(
    "/jobs",
    express.json({ limit: "30mb" }),
    async (req: Request, res: Response) => {
      if (!queue) {
        sendError(res, 503, { error: "Job queue is not configured" });
        return;
      }

      const parsed = policyExtractJobSchema.safeParse(req.body);
      if (!parsed.success) {
        sendError(res, 400, {
          error: parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; "),
        });
        return;
      }

      try {
        const job = await queue.add("extract", parsed.data);
        console.log(
          `[Queue] Queued document ${parsed.data.documentId} as job ${job.id}`,
        );
        res.status(202).json({
          success: true,
          jobId: job.id,
          documentId: parsed.data.documentId,
        });
      } catch (error) {
        console.error("[Queue] Failed to queue document:", describeError(error));
        sendError(res, 500, { error: "Failed to queue document" });
      }
    },
  );

  app.get("/jobs/:id", async (req: Request, res: Response) => {
    if (!queue) {
      sendError(res, 503, { error: "Job queue is not configured" });
      return;
    }

    try {
      const job = await queue.getJob(req.params.id);
      if (!job) {
        sendError(res, 404, { error: `Job ${req.params.id} not found` });
        return;
      }

      const state = await job.getState();
      res.json({
        jobId: job.id,
        state,
        result: state === "completed" ? job.returnvalue : null,
        failedReason: state === "failed" ? (job.failedReason ?? null) : null,
      });
    } catch (error) {
      console.error("[Queue] Failed to read job:", describeError(error));
      sendError(res, 500, { error: "Failed to read job" });
    }
  });

  // Body parser failures (oversized or malformed bodies)
  const handleErrors: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status =
      typeof err === "object" &&
      err !== null &&
      "status" in err &&
      typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 500) {
      console.error("[Server] Request failed:", describeError(err));
      sendError(res, status, { error: "Internal server error" });
      return;
    }
    sendError(res, status, { error: describeError(err) });
  };
  app.use(handleErrors);

  return app;
}
