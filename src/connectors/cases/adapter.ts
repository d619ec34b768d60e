/**
 * Case adapter: mirrors the remote case collection into the local store
 * with one full reconciliation pass per sync. Every pass restarts from the
 * lowest id; nothing is carried over between passes.
 */

import type { Adapter, SyncContext, SyncResult } from "../core/index.js";
import { describeError, isRetryableDetail } from "../core/index.js";
import { reconcile } from "./reconcile.js";
import type { CaseStore } from "./store.js";
import type { PageSource } from "./stream.js";
import { streamPages } from "./stream.js";

export interface CaseAdapterOptions {
  source: PageSource;
  store: CaseStore;
  pageLimit: number;
}

export class CaseAdapter implements Adapter {
  readonly name = "cases";
  private readonly source: PageSource;
  private readonly store: CaseStore;
  private readonly pageLimit: number;

  constructor(opts: CaseAdapterOptions) {
    this.source = opts.source;
    this.store = opts.store;
    this.pageLimit = opts.pageLimit;
  }

  async sync(ctx: SyncContext): Promise<SyncResult> {
    const startTime = Date.now();
    ctx.logger.info("Fetching cases", { pageLimit: this.pageLimit });

    const outcome = await reconcile({
      pages: streamPages(this.source, this.pageLimit, ctx.signal),
      openLocal: (watermark) => this.store.scanFrom(watermark),
      session: this.store.session(),
      logger: ctx.logger,
      signal: ctx.signal,
    });

    const durationMs = Date.now() - startTime;
    if (!outcome.ok) {
      return {
        adapter: this.name,
        pages: 0,
        inserted: 0,
        updated: 0,
        unchanged: 0,
        deleted: 0,
        itemsSynced: 0,
        errors: [
          {
            entity: "cases",
            error: describeError(outcome.error),
            retryable: isRetryableDetail(outcome.error),
          },
        ],
        durationMs,
      };
    }

    const stats = outcome.value;
    if (stats.stale > 0 || stats.skipped > 0) {
      ctx.logger.warn("Pass finished with anomalies", {
        stale: stats.stale,
        skipped: stats.skipped,
      });
    }
    return {
      adapter: this.name,
      pages: stats.pages,
      inserted: stats.inserted,
      updated: stats.updated,
      unchanged: stats.unchanged,
      deleted: stats.deleted,
      itemsSynced: stats.inserted + stats.updated + stats.unchanged,
      errors: [],
      durationMs,
    };
  }
}
