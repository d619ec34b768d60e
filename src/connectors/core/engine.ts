import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { StateManager } from "./state.js";
import type {
  Adapter,
  PersistedState,
  SyncContext,
  SyncEngineConfig,
  SyncResult,
} from "./types.js";

export class SyncEngine {
  private readonly config: SyncEngineConfig;

  constructor(config: SyncEngineConfig) {
    this.config = config;
  }

  async syncAll(signal?: AbortSignal): Promise<SyncResult[]> {
    const results: SyncResult[] = [];
    for (const adapter of this.config.adapters) {
      if (signal?.aborted) break;
      const result = await this.runAdapter(adapter, signal);
      results.push(result);
    }
    return results;
  }

  async syncOne(adapterName: string, signal?: AbortSignal): Promise<SyncResult> {
    const adapter = this.config.adapters.find((a) => a.name === adapterName);
    if (!adapter) {
      throw new Error(
        `Adapter "${adapterName}" not found. Available: ${this.listAdapters().join(", ")}`,
      );
    }
    return this.runAdapter(adapter, signal);
  }

  private async runAdapter(
    adapter: Adapter,
    signal?: AbortSignal,
  ): Promise<SyncResult> {
    const logger = createLogger(adapter.name, { level: this.config.logLevel });
    const stateManager = new StateManager(
      StateManager.pathFor(this.config.stateDir, adapter.name),
    );

    const ctx: SyncContext = {
      logger,
      signal: signal ?? new AbortController().signal,
    };

    logger.info("Starting sync");
    const startTime = Date.now();

    let result: SyncResult;
    try {
      result = await adapter.sync(ctx);
      if (result.errors.length === 0) {
        logger.info(
          `Sync complete: ${result.inserted} inserted, ${result.updated} updated, ${result.deleted} deleted`,
          { pages: result.pages, durationMs: result.durationMs },
        );
      } else {
        for (const e of result.errors) {
          logger.error(`Sync failed on ${e.entity}: ${e.error}`, {
            retryable: e.retryable,
          });
        }
      }
    } catch (err) {
      const errorMsg = errorMessage(err);
      logger.error(`Sync failed: ${errorMsg}`);
      result = {
        adapter: adapter.name,
        pages: 0,
        inserted: 0,
        updated: 0,
        unchanged: 0,
        deleted: 0,
        itemsSynced: 0,
        errors: [{ entity: "sync", error: errorMsg, retryable: false }],
        durationMs: Date.now() - startTime,
      };
    }

    try {
      await stateManager.record(result);
    } catch (err) {
      logger.warn(`Could not write sync state: ${errorMessage(err)}`);
    }

    return result;
  }

  lastState(adapterName: string): PersistedState {
    return new StateManager(
      StateManager.pathFor(this.config.stateDir, adapterName),
    ).getRawState();
  }

  listAdapters(): string[] {
    return this.config.adapters.map((a) => a.name);
  }
}
