/// <reference types="jest" />

import { FakeConnector, mb, recordingLogger } from "../../services/__tests__/fake-connector";
import { EXIT_FATAL, EXIT_OK } from "../reclaim-capacity";
import { parseArgs, runCli } from "../reclaim-cli";

const ENV = {
  RECLAIM_DB_HOST: "db.test",
  RECLAIM_DB_USER: "maintenance",
  RECLAIM_DB_PASSWORD: "test-secret",
  RECLAIM_TABLE: "event_log",
};

describe("parseArgs", () => {
  it("maps flags onto the configuration", () => {
    const rec = recordingLogger();
    const config = parseArgs(
      ["--connect-timeout", "5000", "--threshold", "0.9", "--admin-database", "maint", "--dry-run", "--only", "a,b"],
      ENV,
      rec.logger
    );

    expect(config).toMatchObject({
      connectTimeoutMs: 5000,
      threshold: 0.9,
      adminDatabase: "maint",
      dryRun: true,
      only: ["a", "b"],
    });
  });

  it("keeps the environment value when a flag is absent", () => {
    const config = parseArgs([], { ...ENV, RECLAIM_CONNECT_TIMEOUT_MS: "2500" }, recordingLogger().logger);

    expect(config.connectTimeoutMs).toBe(2500);
  });
});

describe("runCli", () => {
  it("runs the reclaim pass", async () => {
    const connector = new FakeConnector({ orders: { sizeMB: 850, maxSizeBytes: mb(1000) } });
    const rec = recordingLogger();

    await expect(runCli(["--threshold", "0.8"], ENV, rec.logger, () => connector)).resolves.toBe(EXIT_OK);
    expect(rec.info[0]).toBe("Perform action on orders (850 MB > 800 MB)");
  });

  it("exits 2 when an option is missing its value", async () => {
    const rec = recordingLogger();
    const connect = jest.fn();

    await expect(runCli(["--host"], ENV, rec.logger, connect)).resolves.toBe(EXIT_FATAL);
    expect(rec.errors).toEqual(["error: option '--host <host>' argument missing"]);
    expect(connect).not.toHaveBeenCalled();
  });

  it("exits 2 on an unknown option", async () => {
    const rec = recordingLogger();

    await expect(runCli(["--bogus"], ENV, rec.logger, jest.fn())).resolves.toBe(EXIT_FATAL);
    expect(rec.errors[0]).toMatch(/^error: unknown option '--bogus'/);
  });

  it("exits 2 on an invalid value", async () => {
    const rec = recordingLogger();

    await expect(runCli(["--threshold", "1.5"], ENV, rec.logger, jest.fn())).resolves.toBe(EXIT_FATAL);
    expect(rec.errors).toEqual(["[reclaim] Invalid configuration: threshold: threshold must be at most 1"]);
  });

  it("exits 0 after printing help", async () => {
    const rec = recordingLogger();

    await expect(runCli(["--help"], ENV, rec.logger, jest.fn())).resolves.toBe(EXIT_OK);
    expect(rec.info[0]).toMatch(/^Usage: reclaim-capacity/);
  });
});
