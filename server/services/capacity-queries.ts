import { escapeIdentifier } from "pg";
import { z } from "zod";
import type { DatabaseConnection } from "../lib/database";
import { InvalidCapacitySettingError, RemediationTargetMissingError, isUndefinedTableError } from "../lib/errors";

export const BYTES_PER_MB = 1_048_576;

// One row per connectable, non-template database, sized in MB.
export const CATALOG_QUERY = `
  SELECT d.datname AS name,
         pg_database_size(d.oid) / ${BYTES_PER_MB}.0 AS size_mb
  FROM pg_database d
  WHERE d.datallowconn AND NOT d.datistemplate
  ORDER BY d.datname
`;

// missing_ok = true: an unset setting yields NULL instead of an error
export const MAX_SIZE_QUERY = "SELECT current_setting($1, true) AS max_size_bytes";

export type DatabaseRecord = { name: string; currentSizeMB: number };

// pg hands numeric and bigint back as strings
const catalogRowSchema = z.object({
  name: z.string(),
  size_mb: z.union([z.string(), z.number()]).pipe(z.coerce.number().finite().nonnegative()),
});

const maxSizeRowSchema = z.object({
  max_size_bytes: z.string().nullable(),
});

export async function readCatalog(conn: DatabaseConnection): Promise<DatabaseRecord[]> {
  const rows = await conn.query(CATALOG_QUERY);
  return rows.map((row) => {
    const { name, size_mb } = catalogRowSchema.parse(row);
    return { name, currentSizeMB: size_mb };
  });
}

/**
 * Reads the per-database maximum size from `setting`, in MB.
 * Returns null when the database has no maximum configured.
 */
export async function readMaxSizeMB(conn: DatabaseConnection, database: string, setting: string): Promise<number | null> {
  const rows = await conn.query(MAX_SIZE_QUERY, [setting]);
  if (rows.length === 0) return null;

  const raw = maxSizeRowSchema.parse(rows[0]).max_size_bytes?.trim();
  if (!raw) return null;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new InvalidCapacitySettingError(database, setting, raw);
  }
  return Number(raw) / BYTES_PER_MB;
}

export function quoteQualifiedName(name: string): string {
  return name.split(".").map(escapeIdentifier).join(".");
}

export function truncateStatement(table: string): string {
  return `TRUNCATE TABLE ${quoteQualifiedName(table)}`;
}

export async function clearTable(conn: DatabaseConnection, database: string, table: string): Promise<void> {
  try {
    await conn.query(truncateStatement(table));
  } catch (err) {
    if (isUndefinedTableError(err)) throw new RemediationTargetMissingError(database, table, err);
    throw err;
  }
}
