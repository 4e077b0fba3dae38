/**
 * Singleton leaky-bucket rate limiter coordinating all active Mistral requests.
 * Mistral applies one global RPS limit across the chat and OCR endpoints.
 * 429 responses are re-queued, unless the payload reached the 195KB body limit
 * (which Mistral also reports as 429).
 */

interface QueueItem {
  /** Runs the request and resolves the caller's promise on success */
  run: () => Promise<void>;
  reject: (reason: unknown) => void;
  retries: number;
  bodySizeBytes: number;
}

const BODY_SIZE_LIMIT_BYTES = 195 * 1024; // 195KB
const MAX_RATE_LIMIT_RETRIES = 5;

export class MistralRateLimiter {
  private static instance: MistralRateLimiter | null = null;

  private queue: QueueItem[] = [];
  private processing = false;
  private lastRequestTime = 0;
  private readonly minIntervalMs: number;

  constructor(maxRps?: number) {
    const rps =
      (maxRps ?? parseInt(process.env.MISTRAL_MAX_RPS || "1", 10)) || 1;
    this.minIntervalMs = Math.ceil(1000 / rps);
  }

  static getInstance(): MistralRateLimiter {
    if (!MistralRateLimiter.instance) {
      MistralRateLimiter.instance = new MistralRateLimiter();
    }
    return MistralRateLimiter.instance;
  }

  static resetInstance(): void {
    MistralRateLimiter.instance = null;
  }

  /**
   * Queues an asynchronous request, blocking execution until the rate limiter permits dispatch.
   */
  execute<T>(fn: () => Promise<T>, bodySizeBytes = 0): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          resolve(await fn());
        },
        reject,
        retries: 0,
        bodySizeBytes,
      });
      this._startProcessing();
    });
  }

  private _startProcessing(): void {
    this._processQueue().catch((err) => {
      console.error("[MistralRateLimiter] Queue processing failed:", err);
    });
  }

  private async _processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      for (
        let item = this.queue.shift();
        item !== undefined;
        item = this.queue.shift()
      ) {
        // Throttle exact interval spacing based on MISTRAL_MAX_RPS
        const elapsed = Date.now() - this.lastRequestTime;
        if (elapsed < this.minIntervalMs) {
          await this._sleep(this.minIntervalMs - elapsed);
        }

        this.lastRequestTime = Date.now();

        // Dispatch in background so slow responses do not block the queue
        const current = item;
        current.run().catch((err: unknown) => this._handleFailure(current, err));
      }
    } finally {
      this.processing = false;
    }
  }

  private _handleFailure(item: QueueItem, err: unknown): void {
    if (!this._isRateLimitError(err)) {
      item.reject(err);
      return;
    }

    // Distinguish genuine rate limits from undocumented 429 size limits
    const sizeKB = (item.bodySizeBytes / 1024).toFixed(1);
    if (item.bodySizeBytes >= BODY_SIZE_LIMIT_BYTES) {
      item.reject(
        new Error(
          `Mistral rejected payload (${sizeKB}KB >= 195KB limit) with 429, NOT a rate limit, skipping retry`,
        ),
      );
      return;
    }

    if (item.retries >= MAX_RATE_LIMIT_RETRIES) {
      item.reject(err);
      return;
    }

    item.retries++;
    console.warn(
      `[MistralRateLimiter] Rate limited, re-enqueuing (retry #${item.retries}) - ${sizeKB}KB`,
    );
    this.queue.unshift(item);
    this._startProcessing();
  }

  private _isRateLimitError(err: unknown): boolean {
    if (err instanceof Error) {
      return (
        err.message.includes("rate_limited") ||
        err.message.includes("Rate limit") ||
        err.message.includes("(429)")
      );
    }
    return false;
  }

  private _sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
