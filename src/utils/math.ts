/**
 * @fileoverview Vector and score math shared by the index and the matcher.
 */

/**
 * Clamp a value to [0, 1].
 * Useful for confidence scores and probabilities.
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Cosine similarity in [-1, 1]; 0 for mismatched or zero-length vectors.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
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
 * Cosine distance = 1 - similarity (range: 0 to 2)
 */
export function cosineDistance(a: Float32Array, b: Float32Array): number {
  return 1 - cosineSimilarity(a, b);
}

/**
 * Normalize an embedding to unit length. Zero vectors are returned as a copy.
 */
export function normalizeVector(vector: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < vector.length; i += 1) {
    const v = vector[i] ?? 0;
    norm += v * v;
  }
  const result = new Float32Array(vector.length);
  if (norm === 0) {
    result.set(vector);
    return result;
  }
  norm = Math.sqrt(norm);
  for (let i = 0; i < vector.length; i += 1) {
    result[i] = (vector[i] ?? 0) / norm;
  }
  return result;
}
