#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  CaseAdapter,
  CaseService,
  CasesApiClient,
  SqliteCaseStore,
} from "../cases/index.js";
import { CaseApiServer, CaseRouter } from "../../server/index.js";
import type { AppConfig } from "./config.js";
import { dbPathFromEnv, loadConfig, stateDirFor } from "./config.js";
import { SyncEngine } from "./engine.js";
import { createLogger } from "./logger.js";
import { createRateLimiter } from "./rate-limiter.js";
import { PeriodicSync } from "./scheduler.js";
import { StateManager } from "./state.js";
import type { SyncResult } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

interface Runtime {
  config: AppConfig;
  store: SqliteCaseStore;
  client: CasesApiClient;
  engine: SyncEngine;
}

function requireConfig(): AppConfig {
  const loaded = loadConfig();
  if (!loaded.ok) {
    console.error("Configuration incomplete or invalid:");
    for (const problem of loaded.error) {
      console.error(`  - ${problem}`);
    }
    console.error("See .env.example for required variables.");
    process.exit(1);
  }
  return loaded.value;
}

function createRuntime(config: AppConfig): Runtime {
  const store = new SqliteCaseStore(config.dbPath);
  const client = new CasesApiClient({
    baseUrl: config.api.baseUrl,
    user: config.api.user,
    apiKey: config.api.key,
    rateLimiter: createRateLimiter({ minDelayMs: 50 }),
    logger: createLogger("cases-api", { level: config.logLevel }),
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.requestRetries,
  });
  const engine = new SyncEngine({
    stateDir: stateDirFor(config.dbPath),
    adapters: [
      new CaseAdapter({ source: client, store, pageLimit: config.pageLimit }),
    ],
    logLevel: config.logLevel,
  });
  return { config, store, client, engine };
}

function printResults(results: SyncResult[]): void {
  console.log("\n═══ Sync Summary ═══\n");
  for (const r of results) {
    const status = r.errors.length === 0 ? "✓" : "⚠";
    console.log(
      `${status} ${r.adapter}: ${r.inserted} inserted, ${r.updated} updated, ${r.unchanged} unchanged, ${r.deleted} deleted over ${r.pages} pages [${(r.durationMs / 1000).toFixed(1)}s]`,
    );
    for (const err of r.errors) {
      console.log(`  ✗ ${err.entity}: ${err.error}`);
    }
  }
}

const program = new Command()
  .name("case-mirror")
  .description("Mirror the remote case collection into a local SQLite store")
  .version("1.0.0");

program
  .command("sync")
  .description("Run one reconciliation pass and exit")
  .action(async () => {
    const runtime = createRuntime(requireConfig());
    const results = await runtime.engine.syncAll();
    runtime.store.close();

    printResults(results);
    const hasErrors = results.some((r) => r.errors.length > 0);
    process.exit(hasErrors ? 1 : 0);
  });

program
  .command("serve")
  .description("Serve the case API and synchronize periodically")
  .action(async () => {
    const runtime = createRuntime(requireConfig());
    const { config, engine, store, client } = runtime;
    const logger = createLogger("case-mirror", { level: config.logLevel });

    const service = new CaseService(client, store, logger.child("crud"));
    const router = new CaseRouter({
      service,
      logger: logger.child("http"),
      syncState: () => engine.lastState("cases"),
    });
    const server = new CaseApiServer(router, logger.child("http"));
    const scheduler = new PeriodicSync({
      intervalMs: config.syncIntervalMs,
      task: (signal) => engine.syncAll(signal),
      logger: logger.child("scheduler"),
    });

    let shuttingDown = false;
    const shutdown = async () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info("Graceful shutdown requested, finishing current page...");
      await scheduler.stop();
      await server.stop();
      store.close();
      logger.info("Shutdown complete.");
      process.exit(0);
    };
    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${String(error)}`);
        process.exit(1);
      });
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    await server.start({ port: config.port, host: config.host });
    scheduler.start();
  });

program
  .command("status")
  .description("Show the outcome of the last synchronization pass")
  .option("--data <dir>", "Data directory holding the state files (default: beside DB_PATH)")
  .action((opts: { data?: string }) => {
    const dataDir = opts.data ?? stateDirFor(dbPathFromEnv());
    for (const name of ["cases"]) {
      const state = new StateManager(
        StateManager.pathFor(dataDir, name),
      ).getRawState();
      if (!state.lastSyncAt || !state.lastResult) {
        console.log(`${name}: no sync state found`);
        continue;
      }
      const r = state.lastResult;
      const outcome = r.errors.length === 0 ? "ok" : `failed (${r.errors[0]?.error ?? "unknown"})`;
      console.log(
        `${name}: last synced ${state.lastSyncAt}: ${outcome}; ${r.inserted} inserted, ${r.updated} updated, ${r.deleted} deleted`,
      );
    }
  });

program
  .command("adapters")
  .description("List registered adapters")
  .action(() => {
    const runtime = createRuntime(requireConfig());
    console.log("Registered adapters:");
    for (const name of runtime.engine.listAdapters()) {
      console.log(`  - ${name}`);
    }
    runtime.store.close();
  });

program.parse();
