import { vi } from "vitest";
import type {
  CaseCreateInput,
  CaseUpdateInput,
  CaseWriter,
  RemoteCase,
} from "../../src/connectors/cases/index.js";
import { CaseService, SqliteCaseStore } from "../../src/connectors/cases/index.js";
import type { ErrorDetail, PersistedState, Result } from "../../src/connectors/core/index.js";
import { CaseRouter } from "../../src/server/index.js";
import { createSilentLogger } from "../connectors/cases/fixtures.js";

export function createTestRouter(state: PersistedState = { lastSyncAt: null, lastResult: null }) {
  const remote = {
    createCase: vi.fn<(input: CaseCreateInput) => Promise<Result<RemoteCase, ErrorDetail>>>(),
    updateCase:
      vi.fn<(id: number, input: CaseUpdateInput) => Promise<Result<RemoteCase, ErrorDetail>>>(),
    deleteCase: vi.fn<(id: number) => Promise<Result<void, ErrorDetail>>>(),
  } satisfies CaseWriter;
  const store = new SqliteCaseStore(":memory:");
  const logger = createSilentLogger();
  const router = new CaseRouter({
    service: new CaseService(remote, store, logger),
    logger,
    syncState: () => state,
  });
  return { router, remote, store, logger };
}
