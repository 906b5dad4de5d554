import type { ConnectionGroups } from "../store/groups.js";
import { queryRows } from "../store/postgres.js";
import { getInstrumenter } from "../instrument/instrument.js";
import type { RowFilter } from "./params.js";

export interface ExistsQuery {
  table: string;
  column: string;
  value: string | null;
  filter: RowFilter;
  group?: string | null;
}

/** Read-only access the persistence-backed rules need from a data store. */
export interface ExistenceChecker {
  exists(query: ExistsQuery): Promise<boolean>;
}

/**
 * Answers existence queries with a `SELECT 1 ... LIMIT 1` against the store of
 * the requested connection group. Store errors are rethrown untouched.
 */
export class StoreExistenceChecker implements ExistenceChecker {
  constructor(private readonly groups: ConnectionGroups) {}

  async exists(query: ExistsQuery): Promise<boolean> {
    const span = getInstrumenter().startSpan("store", "existence", "exists.query");
    span.setMetadata("table", query.table);
    try {
      const store = await this.groups.get(query.group);
      const d = store.dialect;
      const params: unknown[] = [];
      const cond = (column: string, op: "=" | "<>", value: string | null): string => {
        if (value === null) {
          return `${d.quoteIdent(column)} IS ${op === "=" ? "" : "NOT "}NULL`;
        }
        params.push(value);
        return `${d.quoteIdent(column)} ${op} ${d.placeholder(params.length)}`;
      };

      const where = [cond(query.column, "=", query.value)];
      if (query.filter.kind === "exclude") {
        where.push(cond(query.filter.column, "<>", query.filter.value));
      } else if (query.filter.kind === "where") {
        where.push(cond(query.filter.column, "=", query.filter.value));
      }

      const sql = `SELECT 1 AS found FROM ${d.quoteIdent(query.table)} WHERE ${where.join(" AND ")} LIMIT 1`;
      const rows = await queryRows(store.pool, sql, params);
      span.setStatus("ok");
      span.setMetadata("found", rows.length > 0);
      return rows.length > 0;
    } catch (err) {
      span.setStatus("error");
      span.setMetadata("error", err instanceof Error ? err.message : String(err));
      throw err;
    } finally {
      span.end();
    }
  }
}
