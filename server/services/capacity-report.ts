export type DatabaseOutcome =
  | { status: "remediated"; name: string; currentSizeMB: number; targetSizeMB: number; performed: boolean }
  | { status: "skipped"; name: string; currentSizeMB: number; targetSizeMB: number }
  | { status: "unmanaged"; name: string; currentSizeMB: number }
  | { status: "failed"; name: string; error: Error };

export interface ReclaimReport {
  server: string;
  threshold: number;
  dryRun: boolean;
  outcomes: DatabaseOutcome[];
  failures: number;
  ok: boolean;
  startedAt: Date;
  finishedAt: Date;
}

const MAX_DECIMALS = 6;

// no trailing zeros
export function formatMB(value: number, decimals = 2): string {
  const scale = 10 ** decimals;
  return String(Math.round(value * scale) / scale);
}

/**
 * Formats a size next to its target, adding decimals while the two would
 * otherwise print the same, so a line never reads "800 MB > 800 MB".
 */
export function formatSizes(currentSizeMB: number, targetSizeMB: number): [string, string] {
  for (let decimals = 2; decimals < MAX_DECIMALS; decimals++) {
    const current = formatMB(currentSizeMB, decimals);
    const target = formatMB(targetSizeMB, decimals);
    if (current !== target) return [current, target];
  }
  return [formatMB(currentSizeMB, MAX_DECIMALS), formatMB(targetSizeMB, MAX_DECIMALS)];
}

export function formatOutcome(outcome: DatabaseOutcome, dryRun = false): string {
  const prefix = dryRun ? "[dry-run] " : "";
  switch (outcome.status) {
    case "remediated": {
      const [current, target] = formatSizes(outcome.currentSizeMB, outcome.targetSizeMB);
      return `${prefix}Perform action on ${outcome.name} (${current} MB > ${target} MB)`;
    }
    case "skipped": {
      const [current, target] = formatSizes(outcome.currentSizeMB, outcome.targetSizeMB);
      return `${prefix}Do not perform action on ${outcome.name} (${current} MB <= ${target} MB)`;
    }
    case "unmanaged":
      return `${prefix}Skip ${outcome.name} (${formatMB(outcome.currentSizeMB)} MB, no maximum size configured)`;
    case "failed":
      return `${prefix}Failed to check ${outcome.name}: ${outcome.error.message}`;
  }
}

export function summarize(report: ReclaimReport): string {
  const remediated = report.outcomes.filter((o) => o.status === "remediated").length;
  return `[reclaim] ${report.server}: ${report.outcomes.length} checked, ${remediated} over threshold, ${report.failures} failed`;
}
