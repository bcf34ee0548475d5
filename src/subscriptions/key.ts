/**
 * Deterministic JSON serialization with sorted keys (recursive).
 *
 * Rules:
 * - Primitive values: delegate to JSON.stringify
 * - Arrays: preserve order, recurse into elements; undefined → null
 * - Objects: sort keys alphabetically, recurse into values
 * - Omit keys with `undefined` values (matches JSON.stringify behavior)
 * - Dates serialize as their ISO string
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((v: unknown) => stableStringify(v)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`,
  );
  return `{${pairs.join(",")}}`;
}

/** Join key: the stable form of whatever `by()` returned */
export function correlationKey(value: unknown): string {
  return stableStringify(value);
}
