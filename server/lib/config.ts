import { z } from "zod";
import { ConfigurationError } from "./errors";

const IDENT = "[A-Za-z_][A-Za-z0-9_$]*";
const TABLE_RE = new RegExp(`^${IDENT}(\\.${IDENT})?$`);
const SETTING_RE = new RegExp(`^${IDENT}\\.${IDENT}$`);
const TRUTHY = ["1", "true", "yes", "on"];

const flag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "boolean" ? v : TRUTHY.includes(v.trim().toLowerCase())));

const nameList = z
  .union([z.array(z.string()), z.string()])
  .transform((v) => (Array.isArray(v) ? v : v.split(",")).map((s) => s.trim()).filter(Boolean));

export const reclaimConfigSchema = z.object({
  host: z.string().trim().min(1, "host is required"),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  user: z.string().trim().min(1, "user is required"),
  password: z.string().min(1, "password is required"),
  adminDatabase: z.string().trim().min(1).default("postgres"),
  table: z.string().trim().regex(TABLE_RE, "table must be a table name, optionally schema-qualified"),
  threshold: z.coerce
    .number()
    .gt(0, "threshold must be greater than 0")
    .lte(1, "threshold must be at most 1")
    .default(0.8),
  maxSizeSetting: z
    .string()
    .trim()
    .regex(SETTING_RE, "maxSizeSetting must look like prefix.name")
    .default("capacity.max_size_bytes"),
  ssl: flag.default(false),
  connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
  dryRun: flag.default(false),
  only: nameList.optional(),
});

export type ReclaimConfig = z.infer<typeof reclaimConfigSchema>;
export type ConfigKey = keyof ReclaimConfig;
export type RawConfig = Partial<Record<ConfigKey, unknown>>;

const ENV_KEYS: Record<ConfigKey, string> = {
  host: "RECLAIM_DB_HOST",
  port: "RECLAIM_DB_PORT",
  user: "RECLAIM_DB_USER",
  password: "RECLAIM_DB_PASSWORD",
  adminDatabase: "RECLAIM_ADMIN_DATABASE",
  table: "RECLAIM_TABLE",
  threshold: "RECLAIM_THRESHOLD",
  maxSizeSetting: "RECLAIM_MAX_SIZE_SETTING",
  ssl: "RECLAIM_DB_SSL",
  connectTimeoutMs: "RECLAIM_CONNECT_TIMEOUT_MS",
  dryRun: "RECLAIM_DRY_RUN",
  only: "RECLAIM_ONLY",
};

function isConfigKey(key: string): key is ConfigKey {
  return key in ENV_KEYS;
}

/**
 * Merges environment variables with explicit overrides (CLI flags win) and
 * validates the result. Blank values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Record<string, unknown> = {}): ReclaimConfig {
  const raw: RawConfig = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    if (!isConfigKey(key)) continue;
    const value = overrides[key] ?? env[name];
    if (value === undefined || value === null) continue;
    if (typeof value === "string" && value.trim() === "") continue;
    raw[key] = value;
  }

  const parsed = reclaimConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      field: i.path.join(".") || "config",
      message: i.message,
    }));
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${summary}`, issues);
  }
  return parsed.data;
}
