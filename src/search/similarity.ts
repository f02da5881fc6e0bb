/**
 * Vector similarity and result ordering.
 * Mirrors the ranking done in SQL by `match_feedback`:
 *   similarity = 1 - cosine_distance(a, b), ties broken by ascending id.
 */

/**
 * Cosine similarity of two equal-length vectors.
 * A zero-norm vector has no direction; it scores 0 against everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/** Sort comparator: similarity descending, then id ascending. */
export function compareBySimilarity(
  a: { id: number; similarity: number },
  b: { id: number; similarity: number }
): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  return a.id - b.id;
}

export function isFiniteVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((v) => typeof v === 'number' && Number.isFinite(v))
  );
}
