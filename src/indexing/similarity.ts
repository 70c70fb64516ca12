/**
 * Cosine similarity. Vectors of different length are compared on their common
 * prefix; an empty vector or a zero norm gives 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const m = Math.min(a.length, b.length);
  if (m === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < m; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}
