/**
 * Normalize a tag for storage and lookup.
 *
 * Rules:
 * 1. Trim leading/trailing whitespace
 * 2. Lowercase
 * 3. Collapse internal whitespace to single spaces
 *
 * Examples:
 * - "  Chat Test  " → "chat test"
 * - "JSON_TEST" → "json_test"
 */
export function normalizeTag(s: string): string {
  return s.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Normalize, drop empties, dedupe and sort a tag collection.
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const tag of tags) {
    const norm = normalizeTag(tag);
    if (norm.length > 0) out.add(norm);
  }
  return [...out].sort();
}
