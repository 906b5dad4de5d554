import { NOT_FOUND, type Submission } from "./dot-path.js";
import { invalidArgumentError } from "./errors.js";
import {
  differs,
  equals,
  exactLength,
  greaterThan,
  greaterThanEqualTo,
  inList,
  lessThan,
  lessThanEqualTo,
  matches,
  maxLength,
  minLength,
  notEquals,
  notInList,
  required,
  requiredWith,
  requiredWithout,
  type FieldValue,
} from "./rules.js";
import { isNotUnique, isUnique, type RuleContext } from "./unique.js";

type ParamUsage = "required" | "optional" | "none";

interface RuleEntry {
  param: ParamUsage;
  run(value: unknown, param: string, data: Submission, ctx: RuleContext): boolean | Promise<boolean>;
}

/** Scalar view of a submitted value; structured values have none. */
export function asFieldValue(value: unknown): FieldValue {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  if (typeof value === "boolean") return value ? "1" : "";
  return null;
}

function scalar(fn: (value: FieldValue, param: string) => boolean): RuleEntry {
  return { param: "required", run: (value, param) => fn(asFieldValue(value), param) };
}

function crossField(
  fn: (value: FieldValue, param: string, data: Submission) => boolean,
): RuleEntry {
  return { param: "required", run: (value, param, data) => fn(asFieldValue(value), param, data) };
}

const RULES = {
  differs: crossField(differs),
  equals: scalar(equals),
  exact_length: scalar(exactLength),
  greater_than: scalar(greaterThan),
  greater_than_equal_to: scalar(greaterThanEqualTo),
  in_list: scalar(inList),
  is_not_unique: {
    param: "required",
    run: (value, param, data, ctx) => isNotUnique(asFieldValue(value), param, data, ctx),
  },
  is_unique: {
    param: "required",
    run: (value, param, data, ctx) => isUnique(asFieldValue(value), param, data, ctx),
  },
  less_than: scalar(lessThan),
  less_than_equal_to: scalar(lessThanEqualTo),
  matches: crossField(matches),
  max_length: scalar(maxLength),
  min_length: scalar(minLength),
  not_equals: scalar(notEquals),
  not_in_list: scalar(notInList),
  required: { param: "none", run: (value) => required(value) },
  required_with: { param: "optional", run: requiredWith },
  required_without: { param: "optional", run: requiredWithout },
} satisfies Record<string, RuleEntry>;

export type RuleName = keyof typeof RULES;

export function isRuleName(name: string): name is RuleName {
  return Object.hasOwn(RULES, name);
}

export function ruleNames(): RuleName[] {
  return Object.keys(RULES).filter(isRuleName);
}

/**
 * Runs the named rule. Synchronous rules resolve immediately; database rules
 * resolve once the store has answered.
 */
export async function invokeRule(
  name: string,
  value: unknown,
  param?: string,
  data: Submission = {},
  ctx: RuleContext = {},
): Promise<boolean> {
  if (!isRuleName(name)) {
    throw invalidArgumentError(name, `Unknown rule: ${name}`);
  }
  const entry: RuleEntry = RULES[name];
  if (entry.param === "required" && param === undefined) {
    throw invalidArgumentError(name, `${name} needs a parameter`);
  }
  const input = value === NOT_FOUND ? undefined : value;
  return entry.run(input, param ?? "", data, ctx);
}
