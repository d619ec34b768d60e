import { errorMessage } from "./errors.js";
import type { Logger } from "./types.js";

export interface PeriodicSyncOptions {
  intervalMs: number;
  task: (signal: AbortSignal) => Promise<unknown>;
  logger: Logger;
}

/**
 * Runs `task` every `intervalMs`, measured from the end of the previous run,
 * so two runs never overlap. Owns its stop signal: `stop()` interrupts the
 * wait, aborts the signal handed to the running task and resolves once that
 * task has returned.
 */
export class PeriodicSync {
  private readonly intervalMs: number;
  private readonly task: (signal: AbortSignal) => Promise<unknown>;
  private readonly logger: Logger;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private ticks = 0;

  constructor(opts: PeriodicSyncOptions) {
    if (!(opts.intervalMs > 0)) {
      throw new Error(`intervalMs must be positive, got ${opts.intervalMs}`);
    }
    this.intervalMs = opts.intervalMs;
    this.task = opts.task;
    this.logger = opts.logger;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  get completedTicks(): number {
    return this.ticks;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info(`Periodic sync started (every ${this.intervalMs}ms)`);
  }

  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    this.logger.info("Periodic sync stopped");
  }

  /** One tick outside the loop; failures are logged, never thrown. */
  async runOnce(signal: AbortSignal = new AbortController().signal): Promise<void> {
    try {
      await this.task(signal);
    } catch (err) {
      this.logger.error(`Sync tick failed: ${errorMessage(err)}`);
    } finally {
      this.ticks++;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await waitFor(this.intervalMs, signal);
      if (signal.aborted) break;
      await this.runOnce(signal);
    }
  }
}

function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
