import * as fs from "node:fs";
import * as path from "node:path";
import type { PersistedState, SyncResult } from "./types.js";

const DEFAULT_STATE: PersistedState = {
  lastSyncAt: null,
  lastResult: null,
};

/**
 * Per-adapter state file. Holds the outcome of the most recent pass for
 * `status` and `/health`; reconciliation itself never reads it back.
 */
export class StateManager {
  private state: PersistedState;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.loadFromDisk();
  }

  static pathFor(stateDir: string, adapterName: string): string {
    return path.join(stateDir, adapterName, "_meta", "state.json");
  }

  private loadFromDisk(): PersistedState {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch {
      // Missing or unreadable: start over, the next pass rewrites it
      return { ...DEFAULT_STATE };
    }
    if (typeof parsed !== "object" || parsed === null) {
      return { ...DEFAULT_STATE };
    }
    return { ...DEFAULT_STATE, ...parsed };
  }

  private writeToDisk(): void {
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.state, null, 2));
    fs.renameSync(tmp, this.filePath);
  }

  async record(result: SyncResult): Promise<void> {
    this.state.lastSyncAt = new Date().toISOString();
    this.state.lastResult = result;
    this.writeToDisk();
  }

  getRawState(): PersistedState {
    return { ...this.state };
  }
}
