import { withTimeout } from "../utils/async.js";
import type { RateLimitConfig } from "./embeddingTypes.js";

type QueuedTask = () => Promise<void>;

function readProperty(error: unknown, key: "status" | "code" | "message"): unknown {
  if (typeof error !== "object" || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

export function isRetryableError(error: unknown): boolean {
  const status = readProperty(error, "status");
  if (typeof status === "number") {
    return status === 429 || status >= 500;
  }
  const code = readProperty(error, "code");
  if (typeof code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED", "ECONNREFUSED"].includes(code);
  }
  const message = readProperty(error, "message");
  if (typeof message === "string") {
    return /timeout|timed out|temporarily unavailable/i.test(message);
  }
  return false;
}

export class RequestRateLimiter {
  private readonly config: RateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 300,
      timeoutMs: config.timeoutMs ?? 30_000
    };
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => this.executeTask(task).then(resolve, reject));
      this.drainQueue();
    });
  }

  get pending(): number {
    return this.queue.length + this.activeCount;
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const item = this.queue.shift();
      if (!item) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void item().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(task: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await withTimeout(task(), this.config.timeoutMs, "Embedding request");
      } catch (error) {
        const shouldRetry = isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          throw error;
        }

        attempt += 1;
        const backoff = this.config.retryDelayMs * 2 ** (attempt - 1);
        await this.sleep(backoff);
      }
    }
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
