/**
 * Single-record create, update and delete. The remote system is written
 * first; the local mirror follows only once the remote call succeeded.
 */

import type { ErrorDetail, Logger, Result } from "../core/index.js";
import { err, map, ok } from "../core/index.js";
import type { CaseStore } from "./store.js";
import type {
  CaseCreateInput,
  CaseRecord,
  CaseUpdateInput,
  RemoteCase,
} from "./types.js";
import { toCaseRecord } from "./types.js";

/** The slice of the API client the service writes through. */
export interface CaseWriter {
  createCase(input: CaseCreateInput): Promise<Result<RemoteCase, ErrorDetail>>;
  updateCase(
    id: number,
    input: CaseUpdateInput,
  ): Promise<Result<RemoteCase, ErrorDetail>>;
  deleteCase(id: number): Promise<Result<void, ErrorDetail>>;
}

export interface DeleteOutcome {
  /** The remote system no longer had the case. */
  alreadyGone: boolean;
  deletedLocally: boolean;
}

export class CaseService {
  private readonly remote: CaseWriter;
  private readonly store: CaseStore;
  private readonly logger: Logger;

  constructor(remote: CaseWriter, store: CaseStore, logger: Logger) {
    this.remote = remote;
    this.store = store;
    this.logger = logger;
  }

  async create(input: CaseCreateInput): Promise<Result<RemoteCase, ErrorDetail>> {
    this.logger.info(`Creating case ${input.number}`);
    const created = await this.remote.createCase(input);
    if (!created.ok) return created;

    const remoteCase = created.value;
    const session = this.store.session();
    session.insert(toCaseRecord(remoteCase));
    return map(session.commit(), () => remoteCase);
  }

  async update(
    id: number,
    input: CaseUpdateInput,
  ): Promise<Result<RemoteCase, ErrorDetail>> {
    this.logger.info(`Updating case ${id}`);
    const updated = await this.remote.updateCase(id, input);
    if (!updated.ok) return updated;

    // Not mirrored yet: the next pass inserts it
    const remoteCase = updated.value;
    const record = toCaseRecord(remoteCase);
    const session = this.store.session();
    session.updateVersionAndPayload(record.id, record.version, record.payload);
    return map(session.commit(), () => remoteCase);
  }

  async delete(id: number): Promise<Result<DeleteOutcome, ErrorDetail>> {
    this.logger.info(`Deleting case ${id}`);
    const removed = await this.remote.deleteCase(id);

    let alreadyGone = false;
    if (!removed.ok) {
      // Someone else deleted it upstream; converge with what the next pass would do
      if (removed.error.kind !== "upstream" || removed.error.statusCode !== 404) {
        return err(removed.error);
      }
      alreadyGone = true;
    }

    const session = this.store.session();
    session.delete(id);
    const committed = session.commit();
    if (!committed.ok) return committed;

    const existed = committed.value.deleted > 0;
    this.logger.info(`Deleted case ${id}`, { alreadyGone, existed });
    return ok({ alreadyGone, deletedLocally: existed });
  }

  get(id: number): Result<CaseRecord | undefined, ErrorDetail> {
    return this.store.get(id);
  }
}
