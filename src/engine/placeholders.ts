import { lookupField, type Submission } from "./dot-path.js";

const PLACEHOLDER_RE = /\{(\w+)\}/g;

/**
 * Substitutes `{field}` in a rule parameter with that field's submitted
 * value, e.g. `"users.email,id,{id}"` for an update of user 5. Placeholders
 * without a string or number value are left in place.
 */
export function fillPlaceholders(param: string, data: Submission): string {
  return param.replace(PLACEHOLDER_RE, (match, name: string) => {
    const value = lookupField(name, data);
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    return match;
  });
}
