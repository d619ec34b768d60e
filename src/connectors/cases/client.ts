/**
 * REST client for the remote case API with rate limiting, timeouts and
 * optional in-request retry.
 *
 * Every public method returns a `Result`: transport failures, non-2xx
 * statuses and malformed bodies come back as `ErrorDetail` values.
 */

import type { ErrorDetail, Logger, RateLimiter, Result } from "../core/index.js";
import {
  andThen,
  err,
  errorMessage,
  map,
  ok,
  transportError,
  upstreamError,
  validationError,
  withRetry,
} from "../core/index.js";
import type {
  CaseCreateInput,
  CaseUpdateInput,
  Page,
  RemoteCase,
} from "./types.js";
import { CaseListResponseSchema, RemoteCaseSchema } from "./types.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RETRY_AFTER_MS = 5_000;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

export interface CasesApiClientOptions {
  baseUrl: string;
  user: string;
  apiKey: string;
  rateLimiter: RateLimiter;
  logger: Logger;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  fetch?: typeof fetch;
}

/** Thrown inside the retry loop so `withRetry` can see the status. */
class HttpStatusError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`HTTP ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

export class CasesApiClient {
  private readonly caseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: CasesApiClientOptions) {
    this.caseUrl = `${opts.baseUrl.replace(/\/+$/, "")}/case/`;
    this.headers = {
      Authorization: `apikey ${opts.user}:${opts.apiKey}`,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = opts.maxRetries ?? 0;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.fetchImpl = opts.fetch ?? globalThis.fetch;
  }

  // ─── Listing ───

  /** One page of the ascending-id listing, starting at `offset`. */
  async fetchPage(
    limit: number,
    offset: number,
  ): Promise<Result<Page, ErrorDetail>> {
    const url = `${this.caseUrl}?limit=${limit}&offset=${offset}`;
    const body = await this.request("GET", url);
    return andThen(body, (value) => parsePage(value, offset));
  }

  // ─── Single-record operations ───

  async createCase(input: CaseCreateInput): Promise<Result<RemoteCase, ErrorDetail>> {
    const body = await this.request("POST", this.caseUrl, input);
    return andThen(body, parseCase);
  }

  async updateCase(
    id: number,
    input: CaseUpdateInput,
  ): Promise<Result<RemoteCase, ErrorDetail>> {
    const body = await this.request(
      "PUT",
      `${this.caseUrl}${id}/`,
      omitUnset(input),
    );
    return andThen(body, parseCase);
  }

  async deleteCase(id: number): Promise<Result<void, ErrorDetail>> {
    const body = await this.request("DELETE", `${this.caseUrl}${id}/`);
    return map(body, () => undefined);
  }

  // ─── Transport ───

  private async request(
    method: string,
    url: string,
    payload?: unknown,
  ): Promise<Result<unknown, ErrorDetail>> {
    let text: string;
    try {
      text = await withRetry(
        async () => {
          await this.rateLimiter.acquire();
          const res = await this.fetchImpl(url, {
            method,
            headers: this.headers,
            body: payload === undefined ? undefined : JSON.stringify(payload),
            signal: AbortSignal.timeout(this.timeoutMs),
          });
          this.processRateLimitHeaders(res);

          const responseText = await res.text();
          if (!res.ok) {
            throw new HttpStatusError(res.status, responseText);
          }
          return responseText;
        },
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.retryBaseDelayMs,
          onRetry: (e, attempt, delayMs) =>
            this.logger.warn(
              `${method} ${url} failed (${errorMessage(e)}), retry ${attempt}/${this.maxRetries}`,
              { delayMs: Math.round(delayMs) },
            ),
        },
      );
    } catch (e) {
      if (e instanceof HttpStatusError) {
        this.logger.error(`HTTP error ${e.status}: ${e.body}`, { method, url });
        return err(upstreamError(e.status, e.body));
      }
      this.logger.error(`Network error: ${errorMessage(e)}`, { method, url });
      return err(transportError(e));
    }

    if (text.trim() === "") return ok(null);
    try {
      const json: unknown = JSON.parse(text);
      return ok(json);
    } catch (e) {
      return err(
        validationError(
          "Upstream API returned malformed JSON",
          [errorMessage(e)],
          502,
        ),
      );
    }
  }

  private processRateLimitHeaders(res: Response): void {
    const headerMap: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      if (key.startsWith("x-ratelimit-")) headerMap[key] = value;
    });
    this.rateLimiter.updateFromHeaders(headerMap);

    if (res.status === 429) {
      const retryAfter = parseInt(res.headers.get("retry-after") ?? "", 10);
      const backoffMs =
        !Number.isNaN(retryAfter) && retryAfter > 0
          ? retryAfter * 1000
          : DEFAULT_RETRY_AFTER_MS;
      this.logger.warn(`Rate limited (429), backing off ${backoffMs}ms`);
      this.rateLimiter.backoff(backoffMs);
    }
  }
}

// ─── Helpers ───

function parsePage(body: unknown, offset: number): Result<Page, ErrorDetail> {
  const parsed = CaseListResponseSchema.safeParse(body);
  if (!parsed.success) {
    return err(
      validationError(
        "Upstream API returned an unexpected case listing",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        502,
      ),
    );
  }

  const records = parsed.data.objects;
  for (let i = 1; i < records.length; i++) {
    const prev = records[i - 1];
    const cur = records[i];
    if (prev && cur && cur.id <= prev.id) {
      return err(
        validationError(
          "Upstream API returned a page out of id order",
          [`id ${cur.id} follows id ${prev.id} at offset ${offset}`],
          502,
        ),
      );
    }
  }

  const last = records[records.length - 1];
  return ok({
    records,
    hasMore: Boolean(parsed.data.meta.next),
    maxId: last?.id,
    offset,
  });
}

function parseCase(body: unknown): Result<RemoteCase, ErrorDetail> {
  const parsed = RemoteCaseSchema.safeParse(body);
  if (!parsed.success) {
    return err(
      validationError(
        "Upstream API returned an unexpected case",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        502,
      ),
    );
  }
  return ok(parsed.data);
}

/** Updates send only the fields the caller set. */
function omitUnset(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, v]) => v !== undefined && v !== null),
  );
}
