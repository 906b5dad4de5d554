import type { Dialect } from "./dialect.js";

export class SQLiteDialect implements Dialect {
  name(): "sqlite" {
    return "sqlite";
  }

  // better-sqlite3 binds anonymous parameters in order.
  placeholder(_n: number): string {
    return "?";
  }

  quoteIdent(ident: string): string {
    return `"${ident.replace(/"/g, '""')}"`;
  }
}
