import fs from "node:fs";
import path from "node:path";
import pg from "pg";
import Database from "better-sqlite3";
import type { DatabaseConfig } from "../config/index.js";
import { newDialect, type Dialect } from "./dialect.js";

const { Pool } = pg;
type Pool = pg.Pool;

export type Row = Record<string, unknown>;

// ── SQLite wrapper ──

function adaptSQLForSQLite(sql: string): string {
  // Replace $N positional params with ? (better-sqlite3 uses anonymous ?)
  return sql.replace(/\$\d+/g, "?");
}

export class SQLiteDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
  }

  query(sql: string, params?: unknown[]): { rows: Row[]; rowCount: number } {
    const adaptedSQL = adaptSQLForSQLite(sql);
    const bound = params ?? [];

    const trimmed = adaptedSQL.trimStart().toUpperCase();
    const isRead = trimmed.startsWith("SELECT") || trimmed.startsWith("PRAGMA");

    const stmt = this.db.prepare<unknown[], Row>(adaptedSQL);
    if (isRead) {
      const rows = stmt.all(...bound);
      return { rows, rowCount: rows.length };
    }

    const info = stmt.run(...bound);
    return { rows: [], rowCount: info.changes };
  }

  close(): void {
    this.db.close();
  }
}

// ── Queryable type ──

export type Queryable = Pool | SQLiteDatabase;

function isSQLiteQueryable(q: Queryable): q is SQLiteDatabase {
  return q instanceof SQLiteDatabase;
}

// ── Store class ──

export class Store {
  readonly pool: Queryable;
  readonly dialect: Dialect;

  constructor(pool: Queryable) {
    this.pool = pool;
    this.dialect = newDialect(isSQLiteQueryable(pool) ? "sqlite" : "postgres");
  }

  get isSQLite(): boolean {
    return isSQLiteQueryable(this.pool);
  }

  static async connect(cfg: DatabaseConfig): Promise<Store> {
    if (cfg.driver === "sqlite") {
      if (cfg.name === ":memory:") {
        return new Store(new SQLiteDatabase(":memory:"));
      }
      const dir = cfg.data_dir || "./data";
      fs.mkdirSync(dir, { recursive: true });
      const dbPath = path.join(dir, `${cfg.name}.db`);
      return new Store(new SQLiteDatabase(dbPath));
    }

    const pool = new Pool({
      host: cfg.host,
      port: cfg.port,
      user: cfg.user,
      password: cfg.password,
      database: cfg.name,
      max: cfg.pool_size,
    });
    await pool.query("SELECT 1");
    return new Store(pool);
  }

  async close(): Promise<void> {
    if (isSQLiteQueryable(this.pool)) {
      this.pool.close();
    } else {
      await this.pool.end();
    }
  }
}

// ── Query functions ──
// Driver errors are not wrapped: callers see them as thrown.

export async function queryRows(
  q: Queryable,
  sql: string,
  params: unknown[] = [],
): Promise<Row[]> {
  if (isSQLiteQueryable(q)) {
    return q.query(sql, params).rows;
  }
  const result = await q.query<Row>(sql, params);
  return result.rows;
}

export async function exec(
  q: Queryable,
  sql: string,
  params: unknown[] = [],
): Promise<number> {
  if (isSQLiteQueryable(q)) {
    return q.query(sql, params).rowCount;
  }
  const result = await q.query(sql, params);
  return result.rowCount ?? 0;
}
