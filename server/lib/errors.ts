export type FieldIssue = { field: string; message: string };

export class ConfigurationError extends Error {
  exitCode = 2;
  constructor(public detail: string, public issues: FieldIssue[] = []) {
    super(detail);
    this.name = "ConfigurationError";
  }
}

/** Reading the server catalog failed; nothing can be checked. */
export class CatalogError extends Error {
  exitCode = 2;
  constructor(public detail: string, cause?: unknown) {
    super(cause === undefined ? detail : `${detail}: ${describeError(cause)}`, { cause });
    this.name = "CatalogError";
  }
}

export class DatabaseCheckError extends Error {
  constructor(public database: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "DatabaseCheckError";
  }
}

export class InvalidCapacitySettingError extends Error {
  constructor(public database: string, public setting: string, public value: string) {
    super(`${setting} has invalid value "${value}"`);
    this.name = "InvalidCapacitySettingError";
  }
}

export class RemediationTargetMissingError extends Error {
  constructor(public database: string, public table: string, cause?: unknown) {
    super(`table "${table}" does not exist`, { cause });
    this.name = "RemediationTargetMissingError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

// SQLSTATE undefined_table
export function isUndefinedTableError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "42P01";
}
