import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SyncEngine } from "../../../src/connectors/core/engine.js";
import type { Adapter, SyncContext, SyncResult } from "../../../src/connectors/core/types.js";

class MockAdapter implements Adapter {
  syncCalls: SyncContext[] = [];
  result: Partial<SyncResult> = {};
  failWith: Error | undefined;

  constructor(public name = "mock") {}

  async sync(ctx: SyncContext): Promise<SyncResult> {
    this.syncCalls.push(ctx);
    if (this.failWith) throw this.failWith;
    return {
      adapter: this.name,
      pages: this.result.pages ?? 1,
      inserted: this.result.inserted ?? 2,
      updated: this.result.updated ?? 1,
      unchanged: this.result.unchanged ?? 0,
      deleted: this.result.deleted ?? 0,
      itemsSynced: this.result.itemsSynced ?? 3,
      errors: this.result.errors ?? [],
      durationMs: this.result.durationMs ?? 100,
    };
  }
}

describe("SyncEngine", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "case-mirror-engine-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("runs a single adapter", async () => {
    const adapter = new MockAdapter();
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [adapter] });

    const result = await engine.syncOne("mock");
    expect(result.adapter).toBe("mock");
    expect(result.itemsSynced).toBe(3);
    expect(adapter.syncCalls).toHaveLength(1);
    expect(adapter.syncCalls[0]?.signal.aborted).toBe(false);
  });

  it("runs all adapters in order", async () => {
    const engine = new SyncEngine({
      stateDir: tmpDir,
      adapters: [new MockAdapter("a"), new MockAdapter("b")],
    });

    const results = await engine.syncAll();
    expect(results.map((r) => r.adapter)).toEqual(["a", "b"]);
  });

  it("passes the caller's signal through", async () => {
    const adapter = new MockAdapter();
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [adapter] });
    const controller = new AbortController();

    await engine.syncOne("mock", controller.signal);
    expect(adapter.syncCalls[0]?.signal).toBe(controller.signal);
  });

  it("skips remaining adapters once aborted", async () => {
    const first = new MockAdapter("a");
    const second = new MockAdapter("b");
    const controller = new AbortController();
    first.sync = async (ctx) => {
      controller.abort();
      return MockAdapter.prototype.sync.call(first, ctx);
    };
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [first, second] });

    const results = await engine.syncAll(controller.signal);
    expect(results.map((r) => r.adapter)).toEqual(["a"]);
    expect(second.syncCalls).toHaveLength(0);
  });

  it("throws for unknown adapter", async () => {
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [new MockAdapter()] });
    await expect(engine.syncOne("nonexistent")).rejects.toThrow(
      'Adapter "nonexistent" not found. Available: mock',
    );
  });

  it("turns a thrown adapter error into a failed result", async () => {
    const adapter = new MockAdapter();
    adapter.failWith = new Error("store is read-only");
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [adapter] });

    const result = await engine.syncOne("mock");
    expect(result.errors).toEqual([
      { entity: "sync", error: "store is read-only", retryable: false },
    ]);
    expect(result.itemsSynced).toBe(0);
  });

  it("records the last result as adapter state", async () => {
    const engine = new SyncEngine({ stateDir: tmpDir, adapters: [new MockAdapter()] });
    expect(engine.lastState("mock")).toEqual({ lastSyncAt: null, lastResult: null });

    await engine.syncOne("mock");

    const state = engine.lastState("mock");
    expect(state.lastSyncAt).not.toBeNull();
    expect(state.lastResult?.inserted).toBe(2);
    expect(fs.existsSync(path.join(tmpDir, "mock", "_meta", "state.json"))).toBe(true);
  });

  it("lists adapters", () => {
    const engine = new SyncEngine({
      stateDir: tmpDir,
      adapters: [new MockAdapter("a"), new MockAdapter("b")],
    });
    expect(engine.listAdapters()).toEqual(["a", "b"]);
  });
});
