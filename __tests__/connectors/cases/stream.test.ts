import { describe, expect, it } from "vitest";
import type { Page, PageSource } from "../../../src/connectors/cases/index.js";
import { streamPages } from "../../../src/connectors/cases/index.js";
import type { ErrorDetail, Result } from "../../../src/connectors/core/index.js";
import { err, ok, upstreamError } from "../../../src/connectors/core/index.js";
import { makeCase, makePage } from "./fixtures.js";

class ScriptedSource implements PageSource {
  calls: Array<[number, number]> = [];

  constructor(private readonly responses: Array<Result<Page, ErrorDetail>>) {}

  async fetchPage(limit: number, offset: number): Promise<Result<Page, ErrorDetail>> {
    this.calls.push([limit, offset]);
    const response = this.responses.shift();
    if (!response) throw new Error(`unexpected fetch at offset ${offset}`);
    return response;
  }
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

describe("streamPages", () => {
  it("walks offsets until a page has no continuation", async () => {
    const source = new ScriptedSource([
      ok(makePage([makeCase(1, 1), makeCase(2, 1)], { hasMore: true })),
      ok(makePage([makeCase(3, 1), makeCase(4, 1)], { hasMore: true, offset: 2 })),
      ok(makePage([makeCase(5, 1)], { offset: 4 })),
    ]);

    const pages = await collect(streamPages(source, 2));

    expect(pages).toHaveLength(3);
    expect(source.calls).toEqual([
      [2, 0],
      [2, 2],
      [2, 4],
    ]);
  });

  it("yields a single empty page for an empty collection", async () => {
    const source = new ScriptedSource([ok(makePage([]))]);

    const pages = await collect(streamPages(source, 100));

    expect(pages).toEqual([ok(makePage([]))]);
  });

  it("ends right after yielding a failed fetch", async () => {
    const failure = err(upstreamError(500, "boom"));
    const source = new ScriptedSource([
      ok(makePage([makeCase(1, 1)], { hasMore: true })),
      failure,
    ]);

    const pages = await collect(streamPages(source, 1));

    expect(pages).toHaveLength(2);
    expect(pages[1]).toEqual(failure);
    expect(source.calls).toHaveLength(2);
  });

  it("stops fetching once the signal is aborted", async () => {
    const controller = new AbortController();
    const source = new ScriptedSource([
      ok(makePage([makeCase(1, 1)], { hasMore: true })),
      ok(makePage([makeCase(2, 1)], { offset: 1 })),
    ]);

    const pages: Array<Result<Page, ErrorDetail>> = [];
    for await (const page of streamPages(source, 1, controller.signal)) {
      pages.push(page);
      controller.abort();
    }

    expect(pages).toHaveLength(1);
    expect(source.calls).toEqual([[1, 0]]);
  });

  it("fetches nothing until iterated", () => {
    const source = new ScriptedSource([]);

    streamPages(source, 10);

    expect(source.calls).toEqual([]);
  });

  it("rejects a non-positive limit", async () => {
    const source = new ScriptedSource([]);

    await expect(collect(streamPages(source, 0))).rejects.toThrow(RangeError);
  });
});
