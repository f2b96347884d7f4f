/**
 * @fileoverview Math utilities for scoring and embeddings
 */

/**
 * Cosine similarity of two vectors. Mismatched dimensions or a zero vector
 * give 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Return an L2-normalized copy of `vector`. Norms below `epsilon` are
 * clamped so a zero vector stays zero instead of becoming NaN.
 */
export function l2Normalize(vector: ArrayLike<number>, epsilon = 1e-12): Float32Array {
  let sumSquares = 0;
  for (let i = 0; i < vector.length; i += 1) {
    const v = vector[i] ?? 0;
    sumSquares += v * v;
  }
  const norm = Math.max(Math.sqrt(sumSquares), epsilon);
  const out = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i += 1) {
    out[i] = (vector[i] ?? 0) / norm;
  }
  return out;
}
