import type { Dialect } from "./dialect.js";

export class PostgresDialect implements Dialect {
  name(): "postgres" {
    return "postgres";
  }

  placeholder(n: number): string {
    return `$${n}`;
  }

  quoteIdent(ident: string): string {
    return `"${ident.replace(/"/g, '""')}"`;
  }
}
