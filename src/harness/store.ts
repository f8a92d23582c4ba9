import { Pool, type PoolConfig } from "pg";
import type { PostgresSettings } from "./config.js";
import { runCommand, type CommandRunner } from "./exec.js";
import { errorMessage, log, type Logger } from "./log.js";

/** Read-only view of the stack's relational store. */
export interface SqlStore {
  /** Table names in the `public` schema. */
  listTables(): Promise<string[]>;
  /** Raw `COUNT(*)` text; empty when the query produced nothing. Rejects if the table is missing. */
  countRows(table: string): Promise<string>;
  /** Human-readable table overview for failure reports. */
  describeTables(): Promise<string>;
  close(): Promise<void>;
}

export const LIST_TABLES_SQL = "SELECT tablename FROM pg_tables WHERE schemaname = 'public';";

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function countRowsSql(table: string): string {
  if (!TABLE_NAME.test(table)) {
    throw new Error(`Refusing to query table with unsafe name: ${JSON.stringify(table)}`);
  }
  return `SELECT COUNT(*) FROM ${table};`;
}

/** Upper bound on a single statement or psql call. */
export const QUERY_TIMEOUT_MS = 5_000;

export class PostgresStore implements SqlStore {
  private readonly pool: Pool;

  constructor(settings: PostgresSettings, logger: Logger = log) {
    const poolConfig: PoolConfig = {
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password,
      max: 2,
      // connectionTimeoutMillis defaults to 0, which would hang a poll attempt forever
      connectionTimeoutMillis: 5_000,
      idleTimeoutMillis: 10_000,
      // client-side bound plus a server-side one for statements stuck behind a lock
      query_timeout: QUERY_TIMEOUT_MS,
      statement_timeout: QUERY_TIMEOUT_MS,
    };
    this.pool = new Pool(poolConfig);

    // An idle client error is emitted on the pool; unhandled, it would crash the run
    this.pool.on("error", (err) => {
      logger(`PostgreSQL pool error: ${err.message}`, "yellow");
    });
  }

  async listTables(): Promise<string[]> {
    const result = await this.pool.query<{ tablename: string }>(LIST_TABLES_SQL);
    return result.rows.map((row) => row.tablename);
  }

  async countRows(table: string): Promise<string> {
    const result = await this.pool.query<{ count: string | number }>(countRowsSql(table));
    const count = result.rows[0]?.count;
    return count === undefined ? "" : String(count);
  }

  async describeTables(): Promise<string> {
    try {
      const tables = await this.listTables();
      return tables.length > 0 ? tables.join("\n") : "(no tables in schema public)";
    } catch (err) {
      return `(could not list tables: ${errorMessage(err)})`;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/** Runs `psql` inside the database container, for hosts where the port is not published. */
export class PsqlContainerStore implements SqlStore {
  constructor(
    private readonly settings: PostgresSettings,
    private readonly runtime = "docker",
    private readonly run: CommandRunner = runCommand,
    private readonly timeoutMs = QUERY_TIMEOUT_MS,
  ) {}

  async listTables(): Promise<string[]> {
    const out = await this.psql(["-t", "-c", LIST_TABLES_SQL]);
    return out
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async countRows(table: string): Promise<string> {
    const out = await this.psql(["-t", "-c", countRowsSql(table)]);
    return out.replace(/\s+/g, "");
  }

  async describeTables(): Promise<string> {
    try {
      return await this.psql(["-c", "\\dt"]);
    } catch (err) {
      return `(could not list tables: ${errorMessage(err)})`;
    }
  }

  async close(): Promise<void> {
    // nothing held open between commands
  }

  private async psql(args: string[]): Promise<string> {
    const { exitCode, stdout, stderr } = await this.run(this.runtime, [
      "exec",
      this.settings.container,
      "psql",
      "-U",
      this.settings.user,
      "-d",
      this.settings.database,
      ...args,
    ], { timeoutMs: this.timeoutMs });
    if (exitCode !== 0) {
      throw new Error(`psql exited with ${exitCode}: ${stderr.trim() || "(no output)"}`);
    }
    return stdout;
  }
}

export function createStore(settings: PostgresSettings, runtime: string, logger: Logger = log): SqlStore {
  return settings.client === "docker-psql"
    ? new PsqlContainerStore(settings, runtime)
    : new PostgresStore(settings, logger);
}
