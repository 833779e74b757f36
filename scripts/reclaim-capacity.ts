#!/usr/bin/env node
/**
 * Clears the configured table in every database on a server whose size is over
 * a threshold fraction of its configured maximum. Meant to run from cron.
 *
 *   RECLAIM_DB_HOST=db.internal RECLAIM_TABLE=public.event_log \
 *     npm start -- --threshold 0.8 --dry-run
 */
import "dotenv/config";
import { describeError } from "../server/lib/errors";
import { logger } from "../server/lib/logger";
import { EXIT_FATAL } from "../server/workers/reclaim-capacity";
import { runCli } from "../server/workers/reclaim-cli";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err) => {
    logger.error("[reclaim] failed:", describeError(err));
    process.exit(EXIT_FATAL);
  }
);
