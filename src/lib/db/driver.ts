/**
 * Database driver abstraction for SQLite (local) and PostgreSQL (hosted)
 *
 * - Uses better-sqlite3 when DATABASE_URL is not a postgres connection string
 * - Uses pg when DATABASE_URL starts with "postgres"
 *
 * Queries are written with SQLite-style ? placeholders; the pg client rewrites
 * them to $1, $2, ...
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../logger";

export type DatabaseDriver = "sqlite" | "postgres";

export type DbRow = Record<string, unknown>;

export interface DbResult {
  rows: DbRow[];
  rowCount: number;
}

export interface DatabaseClient {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

let clientInstance: DatabaseClient | null = null;

export function detectDriver(): DatabaseDriver {
  if (process.env.DATABASE_URL?.startsWith("postgres")) {
    return "postgres";
  }
  return "sqlite";
}

export function resolveSqlitePath(): string {
  const configured = process.env.SQLITE_PATH;
  if (configured === ":memory:") {
    return configured;
  }
  return path.resolve(process.cwd(), configured || ".data/briefing.db");
}

/**
 * Get or create the shared database client
 */
export async function getDbClient(): Promise<DatabaseClient> {
  if (clientInstance) {
    return clientInstance;
  }

  const driver = detectDriver();
  const client =
    driver === "postgres"
      ? await createPostgresClient(process.env.DATABASE_URL || "")
      : await createSqliteClient(resolveSqlitePath());

  clientInstance = client;
  logger.info(`Database initialized with ${driver} driver`);
  return client;
}

export async function closeDbClient(): Promise<void> {
  if (clientInstance) {
    const client = clientInstance;
    clientInstance = null;
    await client.close();
  }
}

function isRow(value: unknown): value is DbRow {
  return typeof value === "object" && value !== null;
}

/**
 * Create a better-sqlite3 client. ":memory:" opens a private in-memory database.
 */
export async function createSqliteClient(dbPath: string): Promise<DatabaseClient> {
  const Database = (await import("better-sqlite3")).default;

  if (dbPath !== ":memory:") {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("foreign_keys = ON");

  return {
    driver: "sqlite",

    async query(sql: string, params: unknown[] = []): Promise<DbResult> {
      const stmt = sqlite.prepare(sql);
      if (!stmt.reader) {
        const result = stmt.run(...params);
        return { rows: [], rowCount: result.changes };
      }
      const rows = stmt.all(...params).filter(isRow);
      return { rows, rowCount: rows.length };
    },

    async run(sql: string, params: unknown[] = []): Promise<{ changes: number }> {
      const result = sqlite.prepare(sql).run(...params);
      return { changes: result.changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Create a pg pool-backed client
 */
export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const { Pool } = await import("pg");

  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for PostgreSQL");
  }
  const needsSSL = process.env.NODE_ENV === "production" || process.env.PGSSLMODE === "require";

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 60000,
  });

  await pool.query("SELECT 1");

  return {
    driver: "postgres",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },

    async exec(sql: string): Promise<void> {
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}
