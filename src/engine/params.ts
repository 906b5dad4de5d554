import { invalidRuleSpecError } from "./errors.js";

/** Row filter applied by an existence query. */
export type RowFilter =
  | { kind: "none" }
  | { kind: "exclude"; column: string; value: string }
  | { kind: "where"; column: string; value: string };

export interface TableSpec {
  table: string;
  column: string;
  filter: RowFilter;
}

const NUMERIC_RE = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const INTEGER_RE = /^\s*([+-]?)(\d+)\s*$/;
const PLACEHOLDER_RE = /^\{(\w+)\}$/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isNumeric(value: string | null | undefined): value is string {
  return typeof value === "string" && NUMERIC_RE.test(value);
}

/** Parses a numeric string, or returns null when it is not one. */
export function toNumber(value: string | null | undefined): number | null {
  return isNumeric(value) ? Number(value) : null;
}

/** Parses an integer literal exactly, or returns null for anything else. */
export function toInteger(value: string | null | undefined): bigint | null {
  const m = typeof value === "string" ? INTEGER_RE.exec(value) : null;
  if (!m) return null;
  const digits = BigInt(m[2] ?? "0");
  return m[1] === "-" ? -digits : digits;
}

/** Unicode code point count; absent values have length 0. */
export function charLength(value: string | null | undefined): number {
  return value ? [...value].length : 0;
}

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_RE.test(value);
}

export function splitList(param: string): string[] {
  return param.split(",");
}

/** `" a , b ,c"` -> `["a", "b", "c"]` */
export function parseValueList(param: string): string[] {
  return splitList(param).map((v) => v.trim());
}

/** `"a, b.c"` -> `["a", "b.c"]`, blank entries dropped. */
export function parseFieldList(param: string): string[] {
  return parseValueList(param).filter((f) => f !== "");
}

/** `"5,x,12.9"` -> `[5, 12]`; fractional entries are truncated. */
export function parseLengthList(param: string): number[] {
  const lengths: number[] = [];
  for (const entry of splitList(param)) {
    const n = toNumber(entry);
    if (n !== null) lengths.push(Math.trunc(n));
  }
  return lengths;
}

function resolveFilter(
  kind: "exclude" | "where",
  column: string | undefined,
  value: string | undefined,
): RowFilter {
  if (!column || !value || value === "0" || isPlaceholder(value)) return { kind: "none" };
  return { kind, column, value };
}

/**
 * Parses `table.column[,filterColumn,filterValue]`. The filter pair becomes
 * an exclusion for `is_unique` and a narrowing condition for `is_not_unique`.
 * An empty or "0" value, or a `{placeholder}` the caller never substituted,
 * means no filter.
 */
export function parseTableSpec(
  rule: string,
  spec: string,
  filterKind: "exclude" | "where",
): TableSpec {
  const [target = "", filterColumn, filterValue] = splitList(spec).map((s) => s.trim());
  const match = /^([^.]+)\.([^.]+)$/.exec(target);
  const table = match?.[1];
  const column = match?.[2];
  if (!table || !column || !IDENT_RE.test(table) || !IDENT_RE.test(column)) {
    throw invalidRuleSpecError(rule, spec);
  }
  if (filterColumn && !IDENT_RE.test(filterColumn)) {
    throw invalidRuleSpecError(rule, spec);
  }

  return {
    table,
    column,
    filter: resolveFilter(filterKind, filterColumn, filterValue),
  };
}
