/** Core type definitions for case-mirror. */

// ─── Adapter Interface ───

export interface Adapter {
  name: string;
  sync(ctx: SyncContext): Promise<SyncResult>;
}

// ─── Sync Context (injected by engine) ───

export interface SyncContext {
  logger: Logger;
  signal: AbortSignal;
}

// ─── Sync Result ───

export interface SyncResult {
  adapter: string;
  pages: number;
  inserted: number;
  updated: number;
  unchanged: number;
  deleted: number;
  itemsSynced: number;
  errors: SyncError[];
  durationMs: number;
}

export interface SyncError {
  entity: string;
  error: string;
  retryable: boolean;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export type LogLevel = "debug" | "info";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

// ─── Engine Config ───

export interface SyncEngineConfig {
  stateDir: string;
  adapters: Adapter[];
  logLevel?: LogLevel;
}

// ─── Persisted State Shape ───

export interface PersistedState {
  lastSyncAt: string | null;
  lastResult: SyncResult | null;
}
