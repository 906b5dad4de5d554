import { NOT_FOUND, dotArraySearch, lookupField, type Submission } from "./dot-path.js";
import { invalidArgumentError } from "./errors.js";
import {
  charLength,
  parseFieldList,
  parseLengthList,
  parseValueList,
  toInteger,
  toNumber,
} from "./params.js";

/** A single submitted value as the predicates see it. */
export type FieldValue = string | null | undefined;

// ── Cross-field rules ──

/**
 * The value differs from another field. A plain field name must exist in
 * `data`; a dotted one that resolves to nothing counts as different.
 */
export function differs(value: FieldValue, field: string, data: Submission): boolean {
  if (field.includes(".")) {
    return value !== dotArraySearch(field, data);
  }
  return Object.hasOwn(data, field) && value !== data[field];
}

/** The value equals another field. Same lookup rules as `differs`. */
export function matches(value: FieldValue, field: string, data: Submission): boolean {
  if (field.includes(".")) {
    return value === dotArraySearch(field, data);
  }
  return Object.hasOwn(data, field) && value === data[field];
}

// "0" and 0 count as empty here, unlike in `required`.
function isFilled(v: unknown): boolean {
  if (v === undefined || v === null || v === NOT_FOUND) return false;
  if (v === "" || v === "0" || v === 0 || v === false) return false;
  if (Array.isArray(v)) return v.length > 0;
  if (typeof v === "object") return Object.keys(v).length > 0;
  return true;
}

function dependencyFields(
  rule: string,
  fields: string | null | undefined,
  data: Submission | null | undefined,
): { names: string[]; data: Submission } {
  const names = fields == null ? [] : parseFieldList(fields);
  if (names.length === 0 || !data || Object.keys(data).length === 0) {
    throw invalidArgumentError(rule, "You must supply the parameters: fields, data.");
  }
  return { names, data };
}

/**
 * Required when any of the listed fields is filled in.
 *
 *   required_with[password]
 */
export function requiredWith(
  value: unknown,
  fields: string | null | undefined,
  data: Submission | null | undefined,
): boolean {
  const deps = dependencyFields("required_with", fields, data);
  if (required(value)) return true;

  return !deps.names.some((f) => isFilled(lookupField(f, deps.data)));
}

/**
 * Required when any of the listed fields is missing or empty.
 *
 *   required_without[id,email]
 */
export function requiredWithout(
  value: unknown,
  fields: string | null | undefined,
  data: Submission | null | undefined,
): boolean {
  const deps = dependencyFields("required_without", fields, data);
  if (required(value)) return true;

  return deps.names.every((f) => isFilled(lookupField(f, deps.data)));
}

// ── Scalar rules ──

export function equals(value: FieldValue, expected: string): boolean {
  return value === expected;
}

export function notEquals(value: FieldValue, expected: string): boolean {
  return value !== expected;
}

/** `lengths` is one length or several: "5" | "5,8,12". */
export function exactLength(value: FieldValue, lengths: string): boolean {
  const len = charLength(value);
  return parseLengthList(lengths).some((n) => n === len);
}

/**
 * Orders two numeric strings: -1, 0 or 1, or null when either is not numeric.
 * Integer literals compare exactly, so ids above 2^53 keep their order.
 */
function compare(value: FieldValue, bound: string): number | null {
  const vi = toInteger(value);
  const bi = toInteger(bound);
  if (vi !== null && bi !== null) {
    return vi === bi ? 0 : vi < bi ? -1 : 1;
  }

  const n = toNumber(value);
  const b = toNumber(bound);
  if (n === null || b === null) return null;
  return n === b ? 0 : n < b ? -1 : 1;
}

export function greaterThan(value: FieldValue, min: string): boolean {
  const c = compare(value, min);
  return c !== null && c > 0;
}

export function greaterThanEqualTo(value: FieldValue, min: string): boolean {
  const c = compare(value, min);
  return c !== null && c >= 0;
}

export function lessThan(value: FieldValue, max: string): boolean {
  const c = compare(value, max);
  return c !== null && c < 0;
}

export function lessThanEqualTo(value: FieldValue, max: string): boolean {
  const c = compare(value, max);
  return c !== null && c <= 0;
}

export function maxLength(value: FieldValue, max: string): boolean {
  const b = toNumber(max);
  return b !== null && charLength(value) <= b;
}

export function minLength(value: FieldValue, min: string): boolean {
  const b = toNumber(min);
  return b !== null && charLength(value) >= b;
}

export function inList(value: FieldValue, list: string): boolean {
  if (typeof value !== "string") return false;
  return parseValueList(list).includes(value);
}

export function notInList(value: FieldValue, list: string): boolean {
  return !inList(value, list);
}

/**
 * Objects count as present, arrays when non-empty, anything else when its
 * trimmed string form is non-empty. `false` has an empty string form.
 */
export function required(value: unknown): boolean {
  if (value === null || value === undefined || value === NOT_FOUND) return false;
  if (value === false) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return true;
  return String(value).trim() !== "";
}
