import type { RateLimiter, RateLimiterConfig } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Header-reported remaining budget below which callers wait for the reset. */
const LOW_REMAINING_THRESHOLD = 5;

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;

  private requestTimestamps: number[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  // Allow external updates from response headers
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
  }

  async acquire(): Promise<void> {
    // Wait for backoff (429 response)
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now);
    }

    if (
      this.remainingRequests !== null &&
      this.remainingRequests < LOW_REMAINING_THRESHOLD &&
      this.resetAt !== null &&
      this.resetAt > Date.now()
    ) {
      await sleep(this.resetAt - Date.now() + 100);
      this.remainingRequests = null;
    }

    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }
    }

    if (this.maxRequests < Infinity) {
      this.requestTimestamps = this.requestTimestamps.filter(
        (ts) => Date.now() - ts < this.windowMs,
      );
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0] ?? Date.now();
        const waitMs = this.windowMs - (Date.now() - oldest) + 50;
        await sleep(waitMs);
        this.requestTimestamps = this.requestTimestamps.filter(
          (ts) => Date.now() - ts < this.windowMs,
        );
      }
      this.requestTimestamps.push(Date.now());
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining = headers["x-ratelimit-remaining"];
    if (remaining !== undefined) {
      const parsed = parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    const reset = headers["x-ratelimit-reset"];
    if (reset !== undefined) {
      const resetVal = parseInt(reset, 10);
      // Could be epoch seconds or ms
      if (!Number.isNaN(resetVal)) {
        this.resetAt = resetVal < 1e12 ? resetVal * 1000 : resetVal;
      }
    }
  }

  /** Snapshot for diagnostics and tests. */
  getHeaderBudget(): { remaining: number | null; resetAt: number | null } {
    return { remaining: this.remainingRequests, resetAt: this.resetAt };
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
