import type { DatabaseDriver } from "../config/index.js";

export interface Dialect {
  name(): DatabaseDriver;
  placeholder(n: number): string;
  quoteIdent(ident: string): string;
}

import { PostgresDialect } from "./dialect-postgres.js";
import { SQLiteDialect } from "./dialect-sqlite.js";

export function newDialect(driver: DatabaseDriver): Dialect {
  switch (driver) {
    case "sqlite":
      return new SQLiteDialect();
    case "postgres":
    default:
      return new PostgresDialect();
  }
}
