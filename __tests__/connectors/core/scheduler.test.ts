import { describe, expect, it, vi } from "vitest";
import { PeriodicSync } from "../../../src/connectors/core/scheduler.js";
import { createSilentLogger } from "../cases/fixtures.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("PeriodicSync", () => {
  it("rejects a non-positive interval", () => {
    expect(
      () => new PeriodicSync({ intervalMs: 0, task: async () => undefined, logger: createSilentLogger() }),
    ).toThrow("intervalMs must be positive, got 0");
  });

  it("runs the task repeatedly without overlap", async () => {
    let active = 0;
    let maxActive = 0;
    const scheduler = new PeriodicSync({
      intervalMs: 5,
      task: async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(15);
        active--;
      },
      logger: createSilentLogger(),
    });

    scheduler.start();
    await vi.waitFor(() => expect(scheduler.completedTicks).toBeGreaterThanOrEqual(3));
    await scheduler.stop();

    expect(maxActive).toBe(1);
    expect(scheduler.running).toBe(false);
  });

  it("aborts the running task on stop and waits for it", async () => {
    let seen: AbortSignal | undefined;
    let finished = false;
    const scheduler = new PeriodicSync({
      intervalMs: 5,
      task: async (signal) => {
        seen = signal;
        await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve()));
        finished = true;
      },
      logger: createSilentLogger(),
    });

    scheduler.start();
    await vi.waitFor(() => expect(seen).toBeDefined());
    await scheduler.stop();

    expect(seen?.aborted).toBe(true);
    expect(finished).toBe(true);
    expect(scheduler.completedTicks).toBe(1);
  });

  it("stops during the wait without running the task", async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new PeriodicSync({ intervalMs: 60_000, task, logger: createSilentLogger() });

    scheduler.start();
    await scheduler.stop();

    expect(task).not.toHaveBeenCalled();
  });

  it("logs a failing tick and keeps going", async () => {
    const logger = createSilentLogger();
    const task = vi
      .fn<(signal: AbortSignal) => Promise<unknown>>()
      .mockRejectedValueOnce(new Error("database is locked"))
      .mockResolvedValue(undefined);
    const scheduler = new PeriodicSync({ intervalMs: 5, task, logger });

    scheduler.start();
    await vi.waitFor(() => expect(scheduler.completedTicks).toBeGreaterThanOrEqual(2));
    await scheduler.stop();

    expect(logger.error).toHaveBeenCalledWith("Sync tick failed: database is locked");
  });

  it("ignores a second start and a stop before start", async () => {
    const logger = createSilentLogger();
    const scheduler = new PeriodicSync({ intervalMs: 60_000, task: async () => undefined, logger });

    await scheduler.stop();
    expect(logger.info).not.toHaveBeenCalled();

    scheduler.start();
    scheduler.start();
    await scheduler.stop();

    expect(logger.info.mock.calls).toEqual([
      ["Periodic sync started (every 60000ms)"],
      ["Periodic sync stopped"],
    ]);
  });

  it("runs a single tick on demand", async () => {
    const task = vi.fn(async () => undefined);
    const scheduler = new PeriodicSync({ intervalMs: 1000, task, logger: createSilentLogger() });

    await scheduler.runOnce();

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.completedTicks).toBe(1);
  });
});
