/**
 * Reconciliation engine: merges the ascending-id remote page stream against
 * an ascending-id local cursor in one forward pass, staging inserts, updates
 * and deletes, and committing once per page.
 *
 * Memory is bounded by one remote page plus one local scan batch.
 */

import type { ErrorDetail, Logger, Result } from "../core/index.js";
import { abortedError, err, ok } from "../core/index.js";
import type { LocalCursor, StoreSession } from "./store.js";
import type { CaseRecord, Page } from "./types.js";
import { toCaseRecord, versionOf } from "./types.js";

/** Lowest possible case id; the watermark starts here on every pass. */
export const MIN_CASE_ID = 0;

const DEFAULT_DELETE_BATCH = 1000;

export interface ReconcileOptions {
  pages: AsyncIterable<Result<Page, ErrorDetail>>;
  /** Opens a cursor over stored records with id >= watermark. */
  openLocal: (watermark: number) => LocalCursor;
  session: StoreSession;
  logger: Logger;
  signal?: AbortSignal;
  /** Staged writes are committed early once this many are pending. */
  deleteBatchSize?: number;
}

export interface ReconcileStats {
  pages: number;
  inserted: number;
  updated: number;
  unchanged: number;
  deleted: number;
  /** Remote records at or below an id resolved on an earlier page. */
  skipped: number;
  /** Remote records whose version was lower than the stored one. */
  stale: number;
  watermark: number;
}

export async function reconcile(
  opts: ReconcileOptions,
): Promise<Result<ReconcileStats, ErrorDetail>> {
  const { session, logger } = opts;
  const deleteBatchSize = opts.deleteBatchSize ?? DEFAULT_DELETE_BATCH;
  const stats: ReconcileStats = {
    pages: 0,
    inserted: 0,
    updated: 0,
    unchanged: 0,
    deleted: 0,
    skipped: 0,
    stale: 0,
    watermark: MIN_CASE_ID,
  };

  let local: LocalPointer | undefined;
  let exhausted = false;

  const fail = (error: ErrorDetail): Result<ReconcileStats, ErrorDetail> => {
    session.rollback();
    return err(error);
  };

  // A long run of local-only ids must not pile up in the session
  const stageDelete = (id: number): ErrorDetail | undefined => {
    session.delete(id);
    stats.deleted++;
    if (session.pending < deleteBatchSize) return undefined;
    const committed = session.commit();
    return committed.ok ? undefined : committed.error;
  };

  for await (const pageResult of opts.pages) {
    if (!pageResult.ok) return fail(pageResult.error);
    const page = pageResult.value;
    stats.pages++;
    const before = { ...stats };

    if (!local) {
      local = new LocalPointer(opts.openLocal(stats.watermark));
      const opened = local.advance();
      if (opened) return fail(opened);
    }

    for (const remote of page.records) {
      if (remote.id < stats.watermark) {
        logger.warn(`Skipping case ${remote.id}: already resolved on an earlier page`, {
          watermark: stats.watermark,
          offset: page.offset,
        });
        stats.skipped++;
        continue;
      }

      // Stored records below the remote id have no remote counterpart
      while (local.current && local.current.id < remote.id) {
        const flushed = stageDelete(local.current.id);
        if (flushed) return fail(flushed);
        const moved = local.advance();
        if (moved) return fail(moved);
      }

      const remoteVersion = versionOf(remote);
      const stored = local.current;
      if (stored && stored.id === remote.id) {
        if (remoteVersion > stored.version) {
          const record = toCaseRecord(remote);
          session.updateVersionAndPayload(record.id, record.version, record.payload);
          stats.updated++;
        } else {
          if (remoteVersion < stored.version) {
            logger.warn(`Remote version of case ${remote.id} is behind the stored one`, {
              remoteVersion,
              localVersion: stored.version,
            });
            stats.stale++;
          }
          stats.unchanged++;
        }
        const moved = local.advance();
        if (moved) return fail(moved);
      } else {
        session.insert(toCaseRecord(remote));
        stats.inserted++;
      }
    }

    // Ids up to maxId are resolved; stored records past it wait for the next page
    if (page.maxId !== undefined) {
      stats.watermark = Math.max(stats.watermark, page.maxId + 1);
    }

    const committed = session.commit();
    if (!committed.ok) return fail(committed.error);

    logger.debug(`Page at offset ${page.offset} reconciled`, {
      records: page.records.length,
      inserted: stats.inserted - before.inserted,
      updated: stats.updated - before.updated,
      deleted: stats.deleted - before.deleted,
      watermark: stats.watermark,
    });

    exhausted = !page.hasMore;
    if (exhausted) break;
    if (opts.signal?.aborted) return fail(abortedError());
  }

  // A stream that stopped while announcing more pages was cut short
  if (!exhausted) return fail(abortedError());

  while (local?.current) {
    const flushed = stageDelete(local.current.id);
    if (flushed) return fail(flushed);
    const moved = local.advance();
    if (moved) return fail(moved);
  }
  const committed = session.commit();
  if (!committed.ok) return fail(committed.error);

  return ok(stats);
}

/** Current position of the local cursor; `current` is undefined once drained. */
class LocalPointer {
  current: CaseRecord | undefined;

  constructor(private readonly cursor: LocalCursor) {}

  advance(): ErrorDetail | undefined {
    const next = this.cursor.next();
    if (!next.ok) return next.error;
    this.current = next.value;
    return undefined;
  }
}
