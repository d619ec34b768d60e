import { describe, expect, it } from "vitest";
import { dbPathFromEnv, loadConfig, stateDirFor } from "../../../src/connectors/core/config.js";

const REQUIRED = {
  CASES_API_URL: "https://cases.test/api/v1/",
  CASES_API_USER: "tester",
  CASES_API_KEY: "test-secret",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(REQUIRED)).toEqual({
      ok: true,
      value: {
        api: { baseUrl: "https://cases.test/api/v1", user: "tester", key: "test-secret" },
        dbPath: "./data/cases.db",
        host: "0.0.0.0",
        port: 8000,
        syncIntervalMs: 5000,
        pageLimit: 1000,
        requestTimeoutMs: 30000,
        requestRetries: 0,
        logLevel: "info",
      },
    });
  });

  it("coerces numeric variables", () => {
    const loaded = loadConfig({
      ...REQUIRED,
      API_PORT: "9100",
      SYNC_INTERVAL_MS: "250",
      PAGE_LIMIT: "50",
      LOG_LEVEL: "debug",
    });
    expect(loaded.ok).toBe(true);
    if (!loaded.ok) return;
    expect(loaded.value.port).toBe(9100);
    expect(loaded.value.syncIntervalMs).toBe(250);
    expect(loaded.value.pageLimit).toBe(50);
    expect(loaded.value.logLevel).toBe("debug");
  });

  it("treats empty strings as unset", () => {
    const loaded = loadConfig({ ...REQUIRED, PAGE_LIMIT: "", DB_PATH: "" });
    expect(loaded.ok && loaded.value.pageLimit).toBe(1000);
    expect(loaded.ok && loaded.value.dbPath).toBe("./data/cases.db");
  });

  it("lists every missing or invalid variable", () => {
    const loaded = loadConfig({ CASES_API_URL: "not a url", PAGE_LIMIT: "0" });
    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    const vars = loaded.error.map((line) => line.split(":")[0]);
    expect(vars).toEqual(
      expect.arrayContaining(["CASES_API_URL", "CASES_API_USER", "CASES_API_KEY", "PAGE_LIMIT"]),
    );
    expect(vars).toHaveLength(4);
  });
});

describe("state directory", () => {
  it("follows DB_PATH without needing API credentials", () => {
    expect(stateDirFor(dbPathFromEnv({ DB_PATH: "/var/lib/mirror/cases.db" }))).toBe(
      "/var/lib/mirror",
    );
  });

  it("defaults beside the default database", () => {
    expect(dbPathFromEnv({})).toBe("./data/cases.db");
    expect(dbPathFromEnv({ DB_PATH: "" })).toBe("./data/cases.db");
    expect(stateDirFor(dbPathFromEnv({}))).toBe("./data");
  });

  it("matches the directory derived from the full config", () => {
    const loaded = loadConfig({ ...REQUIRED, DB_PATH: "/srv/cases/mirror.db" });
    expect(loaded.ok && stateDirFor(loaded.value.dbPath)).toBe(
      stateDirFor(dbPathFromEnv({ DB_PATH: "/srv/cases/mirror.db" })),
    );
  });
});
