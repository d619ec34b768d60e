/**
 * SQLite-backed local mirror of remote cases.
 *
 * Reads go straight to the database. Writes are staged on a `StoreSession`
 * and applied in a single transaction on `commit()`, so each writer (a
 * reconciliation page, a single CRUD request) owns its own unit of work.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import type { ErrorDetail, Result } from "../core/index.js";
import { attempt, err, ok, storeError } from "../core/index.js";
import type { CaseRecord } from "./types.js";

const DEFAULT_SCAN_BATCH = 500;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS cases (
  id INTEGER PRIMARY KEY,
  version INTEGER NOT NULL,
  payload TEXT NOT NULL
)`;

// ─── Interfaces ───

/** Ascending-id cursor over stored records. */
export interface LocalCursor {
  next(): Result<CaseRecord | undefined, ErrorDetail>;
}

export interface CommitStats {
  inserted: number;
  updated: number;
  deleted: number;
}

export interface StoreSession {
  insert(record: CaseRecord): void;
  updateVersionAndPayload(id: number, version: number, payload: string): void;
  /** Stages a delete; a missing id is a no-op at commit. */
  delete(id: number): void;
  readonly pending: number;
  commit(): Result<CommitStats, ErrorDetail>;
  rollback(): void;
}

export interface CaseStore {
  scanFrom(id: number): LocalCursor;
  get(id: number): Result<CaseRecord | undefined, ErrorDetail>;
  count(): Result<number, ErrorDetail>;
  session(): StoreSession;
  close(): void;
}

// ─── SQLite implementation ───

export type StagedOp =
  | { kind: "insert"; record: CaseRecord }
  | { kind: "update"; record: CaseRecord }
  | { kind: "delete"; id: number };

export interface SqliteCaseStoreOptions {
  /** Rows fetched per cursor round trip. */
  scanBatchSize?: number;
}

export class SqliteCaseStore implements CaseStore {
  private readonly db: Database.Database;
  private readonly scanBatchSize: number;
  private readonly statements: {
    get: Database.Statement<[number], CaseRecord>;
    scan: Database.Statement<[number, number], CaseRecord>;
    count: Database.Statement<[], { n: number }>;
    insert: Database.Statement<[CaseRecord]>;
    update: Database.Statement<[CaseRecord]>;
    remove: Database.Statement<[number]>;
  };

  constructor(filename: string, opts: SqliteCaseStoreOptions = {}) {
    if (filename !== ":memory:") {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    this.scanBatchSize = opts.scanBatchSize ?? DEFAULT_SCAN_BATCH;

    this.statements = {
      get: this.db.prepare<[number], CaseRecord>(
        "SELECT id, version, payload FROM cases WHERE id = ?",
      ),
      scan: this.db.prepare<[number, number], CaseRecord>(
        "SELECT id, version, payload FROM cases WHERE id > ? ORDER BY id LIMIT ?",
      ),
      count: this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM cases"),
      // A concurrent writer may have stored the id first; keep the higher version
      insert: this.db.prepare<[CaseRecord]>(
        `INSERT INTO cases (id, version, payload) VALUES (@id, @version, @payload)
         ON CONFLICT(id) DO UPDATE SET version = excluded.version, payload = excluded.payload
         WHERE excluded.version > cases.version`,
      ),
      update: this.db.prepare<[CaseRecord]>(
        "UPDATE cases SET version = @version, payload = @payload WHERE id = @id AND version < @version",
      ),
      remove: this.db.prepare<[number]>("DELETE FROM cases WHERE id = ?"),
    };
  }

  scanFrom(id: number): LocalCursor {
    return new BatchedCursor(
      (after, limit) => this.statements.scan.all(after, limit),
      id - 1,
      this.scanBatchSize,
    );
  }

  get(id: number): Result<CaseRecord | undefined, ErrorDetail> {
    return attempt(
      () => this.statements.get.get(id),
      (e) => storeError("read", e),
    );
  }

  count(): Result<number, ErrorDetail> {
    return attempt(
      () => this.statements.count.get()?.n ?? 0,
      (e) => storeError("read", e),
    );
  }

  session(): StoreSession {
    return new SqliteStoreSession(this);
  }

  /** Applies staged operations atomically. */
  apply(ops: StagedOp[]): Result<CommitStats, ErrorDetail> {
    const { insert, update, remove } = this.statements;
    const run = this.db.transaction((staged: StagedOp[]): CommitStats => {
      const stats: CommitStats = { inserted: 0, updated: 0, deleted: 0 };
      for (const op of staged) {
        if (op.kind === "insert") {
          stats.inserted += insert.run(op.record).changes;
        } else if (op.kind === "update") {
          stats.updated += update.run(op.record).changes;
        } else {
          stats.deleted += remove.run(op.id).changes;
        }
      }
      return stats;
    });
    return attempt(
      () => run(ops),
      (e) => storeError("commit", e),
    );
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

class SqliteStoreSession implements StoreSession {
  private ops: StagedOp[] = [];

  constructor(private readonly store: SqliteCaseStore) {}

  get pending(): number {
    return this.ops.length;
  }

  insert(record: CaseRecord): void {
    this.ops.push({ kind: "insert", record });
  }

  updateVersionAndPayload(id: number, version: number, payload: string): void {
    this.ops.push({ kind: "update", record: { id, version, payload } });
  }

  delete(id: number): void {
    this.ops.push({ kind: "delete", id });
  }

  commit(): Result<CommitStats, ErrorDetail> {
    const ops = this.ops;
    this.ops = [];
    if (ops.length === 0) return ok({ inserted: 0, updated: 0, deleted: 0 });
    return this.store.apply(ops);
  }

  rollback(): void {
    this.ops = [];
  }
}

/**
 * Keyset-paginated scan: `id > last ORDER BY id LIMIT batch`. Memory stays
 * at one batch, and writes may land between batches. A short batch marks
 * the end; the cursor then stays exhausted even if later writes add rows
 * past it.
 */
export class BatchedCursor implements LocalCursor {
  private buffer: CaseRecord[] = [];
  private index = 0;
  private exhausted = false;

  constructor(
    private readonly fetchAfter: (after: number, limit: number) => CaseRecord[],
    private lastId: number,
    private readonly batchSize: number,
  ) {}

  next(): Result<CaseRecord | undefined, ErrorDetail> {
    if (this.index >= this.buffer.length) {
      if (this.exhausted) return ok(undefined);
      const batch = attempt(
        () => this.fetchAfter(this.lastId, this.batchSize),
        (e) => storeError("scan", e),
      );
      if (!batch.ok) return err(batch.error);
      this.buffer = batch.value;
      this.index = 0;
      if (this.buffer.length < this.batchSize) this.exhausted = true;
      const last = this.buffer[this.buffer.length - 1];
      if (last === undefined) return ok(undefined);
      this.lastId = last.id;
    }
    const record = this.buffer[this.index];
    this.index++;
    return ok(record);
  }
}
