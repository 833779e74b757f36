import { withConnection, type DatabaseConnector } from "../lib/database";
import {
  CatalogError,
  DatabaseCheckError,
  InvalidCapacitySettingError,
  RemediationTargetMissingError,
} from "../lib/errors";
import { logger as defaultLogger, type Logger } from "../lib/logger";
import { clearTable, readCatalog, readMaxSizeMB, type DatabaseRecord } from "./capacity-queries";
import { formatOutcome, summarize, type DatabaseOutcome, type ReclaimReport } from "./capacity-report";

export interface ReclaimOptions {
  /** Control database the catalog is read from; never itself checked. */
  adminDatabase: string;
  /** Table cleared in every database over its target size. */
  table: string;
  /** Fraction of the maximum size above which the table is cleared. */
  threshold: number;
  maxSizeSetting: string;
  dryRun?: boolean;
  /** Restrict the run to these database names. */
  only?: string[];
}

export type Decision = { targetSizeMB: number; exceeded: boolean };

export function decide(currentSizeMB: number, maxSizeMB: number, threshold: number): Decision {
  const targetSizeMB = maxSizeMB * threshold;
  return { targetSizeMB, exceeded: currentSizeMB > targetSizeMB };
}

/**
 * Walks every database on one server and clears the configured table in those
 * whose size is over `threshold` of their configured maximum.
 *
 * Databases are handled one at a time, each on its own connection. A failure in
 * one database is recorded in the report and the walk moves on; only a failure
 * to read the catalog aborts the run.
 */
export class CapacityReclaimer {
  constructor(
    private readonly connector: DatabaseConnector,
    private readonly options: ReclaimOptions,
    private readonly log: Logger = defaultLogger
  ) {}

  async run(): Promise<ReclaimReport> {
    const startedAt = new Date();
    const dryRun = this.options.dryRun ?? false;
    this.log.debug(
      `[reclaim] checking ${this.connector.server} (threshold ${this.options.threshold}${dryRun ? ", dry run" : ""})`
    );

    const records = await this.listDatabases();
    const outcomes: DatabaseOutcome[] = [];
    for (const record of records) {
      const outcome = await this.checkDatabase(record);
      outcomes.push(outcome);
      if (outcome.status === "failed") this.log.error(formatOutcome(outcome, dryRun));
      else this.log.info(formatOutcome(outcome, dryRun));
    }

    const failures = outcomes.filter((o) => o.status === "failed").length;
    const report: ReclaimReport = {
      server: this.connector.server,
      threshold: this.options.threshold,
      dryRun,
      outcomes,
      failures,
      ok: failures === 0,
      startedAt,
      finishedAt: new Date(),
    };
    this.log.info(summarize(report));
    return report;
  }

  /** Catalog snapshot minus the control database and anything outside `only`. */
  async listDatabases(): Promise<DatabaseRecord[]> {
    const { adminDatabase, only } = this.options;
    let records: DatabaseRecord[];
    try {
      records = await withConnection(this.connector, adminDatabase, readCatalog);
    } catch (err) {
      throw new CatalogError(`Could not read the database catalog on ${this.connector.server}`, err);
    }

    return records.filter((r) => r.name !== adminDatabase && (!only || only.includes(r.name)));
  }

  async checkDatabase(record: DatabaseRecord): Promise<DatabaseOutcome> {
    const { name, currentSizeMB } = record;
    const { table, threshold, maxSizeSetting } = this.options;
    const dryRun = this.options.dryRun ?? false;

    try {
      return await withConnection(this.connector, name, async (conn): Promise<DatabaseOutcome> => {
        const maxSizeMB = await readMaxSizeMB(conn, name, maxSizeSetting);
        if (maxSizeMB === null) return { status: "unmanaged", name, currentSizeMB };

        const { targetSizeMB, exceeded } = decide(currentSizeMB, maxSizeMB, threshold);
        if (!exceeded) return { status: "skipped", name, currentSizeMB, targetSizeMB };

        if (!dryRun) await clearTable(conn, name, table);
        return { status: "remediated", name, currentSizeMB, targetSizeMB, performed: !dryRun };
      });
    } catch (err) {
      const error =
        err instanceof InvalidCapacitySettingError || err instanceof RemediationTargetMissingError
          ? err
          : new DatabaseCheckError(name, err);
      return { status: "failed", name, error };
    }
  }
}
