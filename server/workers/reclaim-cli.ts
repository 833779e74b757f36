import { Command, CommanderError } from "commander";
import { loadConfig, type ReclaimConfig } from "../lib/config";
import { PgConnector, type DatabaseConnector } from "../lib/database";
import { ConfigurationError } from "../lib/errors";
import { logger as defaultLogger, type Logger } from "../lib/logger";
import { EXIT_FATAL, EXIT_OK, runReclaim } from "./reclaim-capacity";

// commander reports these through CommanderError too, but they are not failures
const CLEAN_EXITS = ["commander.helpDisplayed", "commander.version"];

export function buildProgram(log: Logger = defaultLogger): Command {
  return new Command()
    .name("reclaim-capacity")
    .description("Clear a table in databases that are close to their maximum size")
    .option("--host <host>", "database server address (RECLAIM_DB_HOST)")
    .option("--port <port>", "server port (RECLAIM_DB_PORT, default 5432)")
    .option("--user <user>", "login role (RECLAIM_DB_USER)")
    .option("--password <password>", "login password (RECLAIM_DB_PASSWORD)")
    .option("--admin-database <name>", "control database to read the catalog from (default postgres)")
    .option("--table <table>", "table to clear, optionally schema-qualified (RECLAIM_TABLE)")
    .option("--threshold <fraction>", "fraction of the maximum size that triggers clearing (default 0.8)")
    .option("--max-size-setting <name>", "per-database setting holding the maximum size in bytes")
    .option("--ssl", "connect over TLS")
    .option("--connect-timeout <ms>", "connection timeout in milliseconds (default 10000)")
    .option("--dry-run", "report decisions without clearing anything")
    .option("--only <names>", "comma-separated database names to check")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => log.info(str.trimEnd()),
      writeErr: (str) => log.error(str.trimEnd()),
    });
}

/** Parses user arguments (no node/script prefix) over `env`. Throws CommanderError or ConfigurationError. */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv, log: Logger = defaultLogger): ReclaimConfig {
  const program = buildProgram(log);
  program.parse(argv, { from: "user" });

  const opts: Record<string, unknown> = program.opts();
  const { connectTimeout, ...rest } = opts;
  return loadConfig(env, { ...rest, connectTimeoutMs: connectTimeout });
}

export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  log: Logger = defaultLogger,
  connectorFor: (config: ReclaimConfig) => DatabaseConnector = (config) => new PgConnector(config)
): Promise<number> {
  let config: ReclaimConfig;
  try {
    config = parseArgs(argv, env, log);
  } catch (err) {
    // commander has already printed its own message
    if (err instanceof CommanderError) return CLEAN_EXITS.includes(err.code) ? EXIT_OK : EXIT_FATAL;
    if (err instanceof ConfigurationError) {
      log.error(`[reclaim] ${err.detail}`);
      return err.exitCode;
    }
    throw err;
  }
  return runReclaim(config, connectorFor(config), log);
}
