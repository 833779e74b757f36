import { Client } from "pg";
import { describeError } from "./errors";
import { logger } from "./logger";

export type Row = Record<string, unknown>;

export interface DatabaseConnection {
  query(text: string, values?: unknown[]): Promise<Row[]>;
  end(): Promise<void>;
}

/** Opens one connection per call; callers own the returned connection. */
export interface DatabaseConnector {
  readonly server: string;
  connect(database: string): Promise<DatabaseConnection>;
}

export interface ServerSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  ssl: boolean;
  connectTimeoutMs: number;
}

function sslFor(enabled: boolean) {
  // managed servers usually present certificates the local trust store doesn't know
  return enabled ? { rejectUnauthorized: false } : false;
}

export class PgConnector implements DatabaseConnector {
  constructor(private readonly settings: ServerSettings) {}

  get server(): string {
    return `${this.settings.host}:${this.settings.port}`;
  }

  async connect(database: string): Promise<DatabaseConnection> {
    const client = new Client({
      host: this.settings.host,
      port: this.settings.port,
      user: this.settings.user,
      password: this.settings.password,
      database,
      ssl: sslFor(this.settings.ssl),
      connectionTimeoutMillis: this.settings.connectTimeoutMs,
    });
    await client.connect();
    logger.debug(`[db] connected to ${database} on ${this.server}`);

    return {
      query: async (text, values) => (await client.query(text, values)).rows,
      end: () => client.end(),
    };
  }
}

/**
 * Runs `work` on a fresh connection to `database` and closes it afterwards,
 * whether `work` resolved or threw.
 */
export async function withConnection<T>(
  connector: DatabaseConnector,
  database: string,
  work: (conn: DatabaseConnection) => Promise<T>
): Promise<T> {
  const conn = await connector.connect(database);
  try {
    return await work(conn);
  } finally {
    try {
      await conn.end();
    } catch (e) {
      logger.warn(`[db] failed to close connection to ${database}:`, describeError(e));
    }
  }
}
