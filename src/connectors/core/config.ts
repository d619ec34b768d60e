/**
 * Environment-driven configuration, validated with zod.
 */

import * as path from "node:path";
import { z } from "zod";
import type { Result } from "./result.js";
import { err, ok } from "./result.js";

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  CASES_API_URL: z.string().url(),
  CASES_API_USER: z.string().min(1),
  CASES_API_KEY: z.string().min(1),
  DB_PATH: z.string().min(1).default("./data/cases.db"),
  API_HOST: z.string().min(1).default("0.0.0.0"),
  API_PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  SYNC_INTERVAL_MS: positiveInt.default(5000),
  PAGE_LIMIT: positiveInt.default(1000),
  REQUEST_TIMEOUT_MS: positiveInt.default(30_000),
  REQUEST_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  LOG_LEVEL: z.enum(["info", "debug"]).default("info"),
});

export interface AppConfig {
  api: { baseUrl: string; user: string; key: string };
  dbPath: string;
  host: string;
  port: number;
  syncIntervalMs: number;
  pageLimit: number;
  requestTimeoutMs: number;
  requestRetries: number;
  logLevel: "info" | "debug";
}

/** Returns the parsed config, or one `VAR: problem` line per invalid variable. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, string[]> {
  // Empty strings count as unset so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ""),
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    return err(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const c = parsed.data;
  return ok({
    api: {
      baseUrl: c.CASES_API_URL.replace(/\/+$/, ""),
      user: c.CASES_API_USER,
      key: c.CASES_API_KEY,
    },
    dbPath: c.DB_PATH,
    host: c.API_HOST,
    port: c.API_PORT,
    syncIntervalMs: c.SYNC_INTERVAL_MS,
    pageLimit: c.PAGE_LIMIT,
    requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
    requestRetries: c.REQUEST_RETRIES,
    logLevel: c.LOG_LEVEL,
  });
}

/** State files for every adapter live beside the database. */
export function stateDirFor(dbPath: string): string {
  return path.dirname(dbPath);
}

/** `DB_PATH` alone, for commands that never reach the remote API. */
export function dbPathFromEnv(
  env: Record<string, string | undefined> = process.env,
): string {
  return ConfigSchema.shape.DB_PATH.parse(env.DB_PATH || undefined);
}
