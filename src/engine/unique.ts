import type { Submission } from "./dot-path.js";
import { invalidArgumentError } from "./errors.js";
import type { ExistenceChecker, ExistsQuery } from "./existence.js";
import { parseTableSpec } from "./params.js";
import type { FieldValue } from "./rules.js";

/** Submission key that selects the connection group for database rules. */
export const DB_GROUP_KEY = "DBGroup";

export interface RuleContext {
  existence?: ExistenceChecker;
}

function connectionGroup(data: Submission | undefined): string | null {
  const group = data?.[DB_GROUP_KEY];
  return typeof group === "string" && group !== "" ? group : null;
}

function buildQuery(
  rule: string,
  value: FieldValue,
  spec: string,
  data: Submission | undefined,
  filterKind: "exclude" | "where",
): ExistsQuery {
  const { table, column, filter } = parseTableSpec(rule, spec, filterKind);
  return {
    table,
    column,
    value: value ?? null,
    filter,
    group: connectionGroup(data),
  };
}

function checker(rule: string, ctx: RuleContext): ExistenceChecker {
  if (!ctx.existence) {
    throw invalidArgumentError(rule, `${rule} needs a data store to query`);
  }
  return ctx.existence;
}

/**
 * No row holds the value. An optional field/value pair skips one row, which
 * is what updates need.
 *
 *   is_unique[users.email,id,5]
 */
export async function isUnique(
  value: FieldValue,
  spec: string,
  data: Submission | undefined,
  ctx: RuleContext,
): Promise<boolean> {
  const query = buildQuery("is_unique", value, spec, data, "exclude");
  return !(await checker("is_unique", ctx).exists(query));
}

/**
 * At least one row holds the value. An optional field/value pair narrows the
 * match.
 *
 *   is_not_unique[menu.id,active,1]
 */
export async function isNotUnique(
  value: FieldValue,
  spec: string,
  data: Submission | undefined,
  ctx: RuleContext,
): Promise<boolean> {
  const query = buildQuery("is_not_unique", value, spec, data, "where");
  return checker("is_not_unique", ctx).exists(query);
}
