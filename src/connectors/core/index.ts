// Config
export type { AppConfig } from "./config.js";
export { ConfigSchema, dbPathFromEnv, loadConfig, stateDirFor } from "./config.js";
// Sync engine
export { SyncEngine } from "./engine.js";
// Errors
export type { ErrorDetail, ErrorKind, ErrorMessageItem } from "./errors.js";
export {
  abortedError,
  describeError,
  ERROR_FORMAT_VERSION,
  errorMessage,
  isRetryableDetail,
  statusTitle,
  storeError,
  transportError,
  upstreamError,
  validationError,
} from "./errors.js";
// Logger
export type { LoggerOptions } from "./logger.js";
export { ConsoleLogger, createLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
// Result
export type { Result } from "./result.js";
export { andThen, attempt, err, map, ok } from "./result.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { isRetryableError, withRetry } from "./retry.js";
// Scheduler
export type { PeriodicSyncOptions } from "./scheduler.js";
export { PeriodicSync } from "./scheduler.js";
// State management
export { StateManager } from "./state.js";
export type {
  Adapter,
  Logger,
  LogLevel,
  PersistedState,
  RateLimiter,
  RateLimiterConfig,
  SyncContext,
  SyncEngineConfig,
  SyncError,
  SyncResult,
} from "./types.js";
