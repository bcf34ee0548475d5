/** Sparse vector: dimension key → weight. Absent keys are zero. */
export type TermVector = ReadonlyMap<string, number>;

/**
 * Turns texts into vectors comparable by cosine similarity.
 * A dense model embedding fits by keying each dimension by its index.
 */
export interface Embedder {
  embed(texts: readonly string[]): Promise<TermVector[]>;
}

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from",
  "has", "have", "i", "in", "is", "it", "its", "me", "my", "of",
  "on", "or", "our", "so", "that", "the", "this", "to", "was", "we",
  "with", "you", "your",
]);

const SUFFIXES = ["ing", "ed", "es", "s"];

/** Crude suffix stripping so "charged", "charges" and "charge" collide */
export function stem(token: string): string {
  let out = token;
  for (const suffix of SUFFIXES) {
    if (out.length > suffix.length + 2 && out.endsWith(suffix)) {
      out = out.slice(0, -suffix.length);
      break;
    }
  }
  if (out.length > 3 && out.endsWith("e")) out = out.slice(0, -1);
  return out;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= 2 && !STOP_WORDS.has(t))
    .map(stem);
}

/**
 * Term-frequency embedder. Each text becomes its own term → count map, so
 * nothing is kept between calls.
 */
export class LexicalEmbedder implements Embedder {
  async embed(texts: readonly string[]): Promise<TermVector[]> {
    return texts.map(termCounts);
  }
}

export function termCounts(text: string): TermVector {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function norm(vector: TermVector): number {
  let sum = 0;
  for (const weight of vector.values()) sum += weight * weight;
  return Math.sqrt(sum);
}

/** 0 when either vector is empty or all zeros */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [key, weight] of small) {
    const other = large.get(key);
    if (other !== undefined) dot += weight * other;
  }
  const denominator = norm(a) * norm(b);
  return denominator === 0 ? 0 : dot / denominator;
}
