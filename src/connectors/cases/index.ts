export type { CaseAdapterOptions } from "./adapter.js";
export { CaseAdapter } from "./adapter.js";
export type { CasesApiClientOptions } from "./client.js";
export { CasesApiClient } from "./client.js";
export type { ReconcileOptions, ReconcileStats } from "./reconcile.js";
export { MIN_CASE_ID, reconcile } from "./reconcile.js";
export type { CaseWriter, DeleteOutcome } from "./service.js";
export { CaseService } from "./service.js";
export type {
  CaseStore,
  CommitStats,
  LocalCursor,
  SqliteCaseStoreOptions,
  StoreSession,
} from "./store.js";
export { BatchedCursor, SqliteCaseStore } from "./store.js";
export type { PageSource } from "./stream.js";
export { streamPages } from "./stream.js";
export type {
  CaseCreateInput,
  CaseListResponse,
  CaseRecord,
  CaseUpdateInput,
  Page,
  RemoteCase,
} from "./types.js";
export {
  CaseCreateSchema,
  CaseListResponseSchema,
  CaseUpdateSchema,
  RemoteCaseSchema,
  toCaseRecord,
  versionOf,
} from "./types.js";
