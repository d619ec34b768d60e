import type { Mock } from "vitest";
import { vi } from "vitest";
import type {
  CaseRecord,
  CaseStore,
  Page,
  RemoteCase,
} from "../../../src/connectors/cases/index.js";
import type { ErrorDetail, Logger, Result } from "../../../src/connectors/core/index.js";
import { ok } from "../../../src/connectors/core/index.js";

export function makeCase(
  id: number,
  version: number,
  extra: Record<string, unknown> = {},
): RemoteCase {
  return { id, logical_timestamp: version, ...extra };
}

export function makePage(
  records: RemoteCase[],
  opts: { hasMore?: boolean; offset?: number } = {},
): Page {
  const last = records[records.length - 1];
  return {
    records,
    hasMore: opts.hasMore ?? false,
    maxId: last?.id,
    offset: opts.offset ?? 0,
  };
}

/** Splits records into consecutive pages of the given sizes. */
export function splitIntoPages(records: RemoteCase[], sizes: number[]): Page[] {
  const pages: Page[] = [];
  let start = 0;
  sizes.forEach((size, i) => {
    pages.push(
      makePage(records.slice(start, start + size), {
        hasMore: i < sizes.length - 1,
        offset: start,
      }),
    );
    start += size;
  });
  return pages;
}

export async function* pagesOf(
  ...pages: Array<Page | Result<Page, ErrorDetail>>
): AsyncGenerator<Result<Page, ErrorDetail>> {
  for (const page of pages) {
    yield "ok" in page ? page : ok(page);
  }
}

export interface RecordingLogger extends Logger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createSilentLogger(): RecordingLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function seed(store: CaseStore, records: CaseRecord[]): void {
  const session = store.session();
  for (const r of records) session.insert(r);
  const committed = session.commit();
  if (!committed.ok) throw new Error(committed.error.detail);
}

export function record(id: number, version: number, payload = "{}"): CaseRecord {
  return { id, version, payload };
}

/** Every stored record in id order. */
export function dump(store: CaseStore): CaseRecord[] {
  const cursor = store.scanFrom(0);
  const out: CaseRecord[] = [];
  for (;;) {
    const next = cursor.next();
    if (!next.ok) throw new Error(next.error.detail);
    if (!next.value) return out;
    out.push(next.value);
  }
}
