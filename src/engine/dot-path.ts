/** A submitted data set: field name to value, values may nest. */
export type Submission = Readonly<Record<string, unknown>>;

/**
 * Returned by `dotArraySearch` when nothing matches. Distinct from `""` and
 * from a field that was found holding `null`.
 */
export const NOT_FOUND: unique symbol = Symbol("NOT_FOUND");

export function isFound(value: unknown): boolean {
  return value !== NOT_FOUND;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function children(node: unknown): unknown[] {
  if (Array.isArray(node)) return node;
  if (isRecord(node)) return Object.values(node);
  return [];
}

function search(segments: readonly string[], node: unknown): unknown {
  if (segments.length === 0) return node;
  const [head, ...rest] = segments;
  if (head === undefined) return node;

  if (head === "*") {
    for (const child of children(node)) {
      const found = search(rest, child);
      if (found !== NOT_FOUND) return found;
    }
    return NOT_FOUND;
  }

  if (isRecord(node)) {
    if (!Object.hasOwn(node, head)) return NOT_FOUND;
    return search(rest, node[head]);
  }

  if (Array.isArray(node)) {
    if (/^\d+$/.test(head)) {
      const idx = Number(head);
      return idx < node.length ? search(rest, node[idx]) : NOT_FOUND;
    }
    // A named segment against a list searches every element.
    for (const item of node) {
      const found = search(segments, item);
      if (found !== NOT_FOUND) return found;
    }
  }

  return NOT_FOUND;
}

/**
 * Looks a field up by dotted path. An exact key equal to the whole path wins;
 * otherwise each segment steps into nested objects or arrays, `*` matches any
 * element and the first hit is returned.
 *
 *   dotArraySearch("user.emails.*.address", data)
 */
export function dotArraySearch(key: string, data: Submission): unknown {
  if (Object.hasOwn(data, key)) return data[key];

  const trimmed = key.replace(/[* ]+$/, "").replace(/\.+$/, "");
  if (trimmed === "") return NOT_FOUND;
  return search(trimmed.split("."), data);
}

/** Exact key for plain names, dotted search for names containing a dot. */
export function lookupField(field: string, data: Submission): unknown {
  if (field.includes(".")) return dotArraySearch(field, data);
  return Object.hasOwn(data, field) ? data[field] : NOT_FOUND;
}
