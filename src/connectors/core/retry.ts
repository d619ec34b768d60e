function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

const TRANSIENT_MESSAGES = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "enotfound",
  "socket hang up",
  "fetch failed",
];

export function isRetryableError(err: unknown): boolean {
  if (err instanceof Error) {
    if (err.name === "TimeoutError") return true;
    const msg = err.message.toLowerCase();
    if (TRANSIENT_MESSAGES.some((m) => msg.includes(m))) {
      return true;
    }
  }
  // HTTP status carried on the error
  if (typeof err === "object" && err !== null && "status" in err) {
    const status = err.status;
    if (typeof status === "number") {
      return status === 429 || (status >= 500 && status < 600);
    }
  }
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      // Exponential backoff with jitter
      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      const jitter = delay * 0.1 * Math.random();
      opts.onRetry?.(err, attempt + 1, delay + jitter);
      await sleep(delay + jitter);
    }
  }
  throw lastError;
}
