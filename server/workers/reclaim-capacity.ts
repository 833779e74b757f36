import type { ReclaimConfig } from "../lib/config";
import { PgConnector, type DatabaseConnector } from "../lib/database";
import { CatalogError, describeError } from "../lib/errors";
import { logger as defaultLogger, type Logger } from "../lib/logger";
import { CapacityReclaimer } from "../services/capacity-reclaimer";

export const EXIT_OK = 0;
export const EXIT_DATABASE_FAILURES = 1;
export const EXIT_FATAL = 2;

/**
 * One scheduled reclaim pass over the configured server.
 * Resolves to the process exit code; never rejects.
 */
export async function runReclaim(
  config: ReclaimConfig,
  connector: DatabaseConnector = new PgConnector(config),
  log: Logger = defaultLogger
): Promise<number> {
  const reclaimer = new CapacityReclaimer(
    connector,
    {
      adminDatabase: config.adminDatabase,
      table: config.table,
      threshold: config.threshold,
      maxSizeSetting: config.maxSizeSetting,
      dryRun: config.dryRun,
      only: config.only,
    },
    log
  );

  try {
    const report = await reclaimer.run();
    return report.ok ? EXIT_OK : EXIT_DATABASE_FAILURES;
  } catch (err) {
    const reason = err instanceof CatalogError ? err.message : `unexpected error: ${describeError(err)}`;
    log.error(`[reclaim] run aborted on ${connector.server}: ${reason}`);
    return EXIT_FATAL;
  }
}
