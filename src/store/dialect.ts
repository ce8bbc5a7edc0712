import type { DatabaseDriver } from "../config/index.js";
import { PostgresDialect } from "./dialect-postgres.js";
import { SQLiteDialect } from "./dialect-sqlite.js";

export interface Dialect {
  name(): DatabaseDriver;
  /** DDL for the _files table and its indexes. Must be idempotent. */
  filesTableSQL(): string;
}

export function newDialect(driver: DatabaseDriver): Dialect {
  switch (driver) {
    case "sqlite":
      return new SQLiteDialect();
    case "postgres":
    default:
      return new PostgresDialect();
  }
}
