/// <reference types="jest" />

import { loadConfig } from "../config";
import { ConfigurationError } from "../errors";

const BASE_ENV = {
  RECLAIM_DB_HOST: "db.internal",
  RECLAIM_DB_USER: "maintenance",
  RECLAIM_DB_PASSWORD: "test-secret",
  RECLAIM_TABLE: "public.event_log",
};

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      host: "db.internal",
      port: 5432,
      user: "maintenance",
      password: "test-secret",
      adminDatabase: "postgres",
      table: "public.event_log",
      threshold: 0.8,
      maxSizeSetting: "capacity.max_size_bytes",
      ssl: false,
      connectTimeoutMs: 10000,
      dryRun: false,
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      ...BASE_ENV,
      RECLAIM_DB_PORT: "6432",
      RECLAIM_ADMIN_DATABASE: "maintenance_db",
      RECLAIM_THRESHOLD: "0.75",
      RECLAIM_MAX_SIZE_SETTING: "ops.quota_bytes",
      RECLAIM_DB_SSL: "TRUE",
      RECLAIM_CONNECT_TIMEOUT_MS: "2500",
      RECLAIM_DRY_RUN: "1",
      RECLAIM_ONLY: "orders, billing",
    });

    expect(config).toMatchObject({
      port: 6432,
      adminDatabase: "maintenance_db",
      threshold: 0.75,
      maxSizeSetting: "ops.quota_bytes",
      ssl: true,
      connectTimeoutMs: 2500,
      dryRun: true,
      only: ["orders", "billing"],
    });
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { ...BASE_ENV, RECLAIM_THRESHOLD: "0.5" },
      { threshold: "0.9", dryRun: true, only: "a, b,,c", host: undefined }
    );

    expect(config.threshold).toBe(0.9);
    expect(config.dryRun).toBe(true);
    expect(config.only).toEqual(["a", "b", "c"]);
    expect(config.host).toBe("db.internal");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ ...BASE_ENV, RECLAIM_DB_PORT: "", RECLAIM_THRESHOLD: "  " })).toMatchObject({
      port: 5432,
      threshold: 0.8,
    });
  });

  it("rejects thresholds outside (0, 1]", () => {
    expect(configError(() => loadConfig({ ...BASE_ENV, RECLAIM_THRESHOLD: "1.5" })).issues).toEqual([
      { field: "threshold", message: "threshold must be at most 1" },
    ]);
    expect(configError(() => loadConfig({ ...BASE_ENV, RECLAIM_THRESHOLD: "0" })).issues).toEqual([
      { field: "threshold", message: "threshold must be greater than 0" },
    ]);
  });

  it("names every missing required field", () => {
    const err = configError(() => loadConfig({ RECLAIM_DB_USER: "maintenance" }));

    expect(err.issues.map((i) => i.field)).toEqual(["host", "password", "table"]);
    expect(err.exitCode).toBe(2);
    expect(err.message).toMatch(/^Invalid configuration: host: /);
  });

  it("requires a user", () => {
    const { RECLAIM_DB_USER: _omitted, ...env } = BASE_ENV;
    const err = configError(() => loadConfig(env));

    expect(err.issues.map((i) => i.field)).toEqual(["user"]);
  });

  it("treats a blank user as missing", () => {
    const err = configError(() => loadConfig({ ...BASE_ENV, RECLAIM_DB_USER: "   " }));

    expect(err.issues.map((i) => i.field)).toEqual(["user"]);
  });

  it("rejects table names that are not identifiers", () => {
    const err = configError(() => loadConfig({ ...BASE_ENV, RECLAIM_TABLE: "event_log; DROP TABLE users" }));

    expect(err.issues.map((i) => i.field)).toEqual(["table"]);
  });
});
