import type { ErrorDetail, Result } from "../core/index.js";
import type { Page } from "./types.js";

/** The slice of the API client the page stream needs. */
export interface PageSource {
  fetchPage(limit: number, offset: number): Promise<Result<Page, ErrorDetail>>;
}

/**
 * Lazily walks the offset-paginated listing from offset 0. Each call starts
 * a fresh walk. The sequence ends after a page without continuation, or
 * right after the first failed fetch is yielded.
 */
export async function* streamPages(
  source: PageSource,
  limit: number,
  signal?: AbortSignal,
): AsyncGenerator<Result<Page, ErrorDetail>> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Page limit must be a positive integer, got ${limit}`);
  }

  let offset = 0;
  while (!signal?.aborted) {
    const page = await source.fetchPage(limit, offset);
    yield page;
    if (!page.ok || !page.value.hasMore) return;
    offset += limit;
  }
}
