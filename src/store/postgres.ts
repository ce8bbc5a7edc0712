import fs from "node:fs";
import path from "node:path";
import pg from "pg";
import Database from "better-sqlite3";
import type { DatabaseConfig } from "../config/index.js";
import { newDialect, type Dialect } from "./dialect.js";

const { Pool } = pg;
type Pool = pg.Pool;

export type SqlParam = string | number | boolean | Date | null;
export type Row = Record<string, unknown>;

// ── SQLite wrapper ──

/**
 * Rewrites $N placeholders to anonymous ? and reorders the parameters by
 * occurrence, so one placeholder may appear several times in a statement.
 */
export function adaptSQLForSQLite(sql: string, params: SqlParam[]): { sql: string; params: SqlParam[] } {
  const ordered: SqlParam[] = [];
  const adapted = sql.replace(/\$(\d+)/g, (_m, n: string) => {
    const idx = Number(n) - 1;
    if (idx < 0 || idx >= params.length) {
      throw new Error(`Missing SQL parameter $${n}`);
    }
    ordered.push(params[idx]);
    return "?";
  });
  return { sql: adapted, params: ordered };
}

function encodeSQLiteParams(params: SqlParam[]): (string | number | null)[] {
  return params.map((p) => {
    if (p === null) return null;
    if (typeof p === "boolean") return p ? 1 : 0;
    if (p instanceof Date) return p.toISOString();
    return p;
  });
}

export class SQLiteDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
  }

  query(sql: string, params: SqlParam[] = []): { rows: Row[]; rowCount: number } {
    const adapted = adaptSQLForSQLite(sql, params);
    const encoded = encodeSQLiteParams(adapted.params);

    const trimmed = adapted.sql.trimStart().toUpperCase();
    const isRead = trimmed.startsWith("SELECT") || trimmed.startsWith("PRAGMA") || trimmed.startsWith("WITH");
    const hasReturning = /\bRETURNING\b/i.test(adapted.sql);

    const stmt = this.db.prepare<(string | number | null)[], Row>(adapted.sql);
    if (isRead || hasReturning) {
      const rows = stmt.all(...encoded);
      return { rows, rowCount: rows.length };
    }

    const info = stmt.run(...encoded);
    return { rows: [], rowCount: info.changes };
  }

  execMulti(sql: string): void {
    this.db.exec(sql);
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
  pool: Queryable;
  dialect: Dialect;

  constructor(pool: Queryable, dialect: Dialect) {
    this.pool = pool;
    this.dialect = dialect;
  }

  get isSQLite(): boolean {
    return isSQLiteQueryable(this.pool);
  }

  static async connect(cfg: DatabaseConfig): Promise<Store> {
    const dialect = newDialect(cfg.driver);
    if (cfg.driver === "sqlite") {
      fs.mkdirSync(cfg.data_dir, { recursive: true });
      const dbPath = path.join(cfg.data_dir, `${cfg.name}.db`);
      return new Store(new SQLiteDatabase(dbPath), dialect);
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
    return new Store(pool, dialect);
  }

  async execMulti(sql: string): Promise<void> {
    if (isSQLiteQueryable(this.pool)) {
      this.pool.execMulti(sql);
      return;
    }
    await this.pool.query(sql);
  }

  async close(): Promise<void> {
    if (isSQLiteQueryable(this.pool)) {
      this.pool.close();
    } else {
      await this.pool.end();
    }
  }
}

// ── Error handling ──

export class UniqueViolationError extends Error {
  detail: string;
  constraint: string;

  constructor(message: string, detail: string, constraint: string) {
    super(message);
    this.detail = detail;
    this.constraint = constraint;
  }
}

function field(err: object, key: string): string | undefined {
  const v: unknown = Reflect.get(err, key);
  return typeof v === "string" ? v : undefined;
}

export function mapPgError(err: unknown): unknown {
  if (typeof err !== "object" || err === null) return err;
  // PostgreSQL unique violation
  if (field(err, "code") === "23505") {
    return new UniqueViolationError(
      field(err, "message") ?? "unique violation",
      field(err, "detail") ?? "",
      field(err, "constraint") ?? "",
    );
  }
  // SQLite unique violation
  const message = field(err, "message");
  if (message !== undefined && message.includes("UNIQUE constraint failed")) {
    return new UniqueViolationError(message, message, "");
  }
  return err;
}

// ── Query functions ──

export async function queryRows(
  q: Queryable,
  sql: string,
  params: SqlParam[] = [],
): Promise<Row[]> {
  try {
    if (isSQLiteQueryable(q)) {
      return q.query(sql, params).rows;
    }
    const result = await q.query<Row>(sql, params);
    return result.rows;
  } catch (err) {
    throw mapPgError(err);
  }
}

export async function exec(
  q: Queryable,
  sql: string,
  params: SqlParam[] = [],
): Promise<number> {
  try {
    if (isSQLiteQueryable(q)) {
      return q.query(sql, params).rowCount;
    }
    const result = await q.query(sql, params);
    return result.rowCount ?? 0;
  } catch (err) {
    throw mapPgError(err);
  }
}
