/**
 * Vector helpers for voice fingerprints.
 */

export function isFiniteVector(vector: readonly number[]): boolean {
  return vector.length > 0 && vector.every((value) => Number.isFinite(value));
}

function assertSameLength(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
}

/**
 * Elementwise arithmetic mean. All vectors must share one dimension.
 */
export function meanVector(vectors: readonly (readonly number[])[]): number[] {
  if (vectors.length === 0) {
    throw new RangeError("Cannot average an empty set of vectors");
  }

  const first = vectors[0];
  const sum = new Array<number>(first.length).fill(0);

  for (const vector of vectors) {
    assertSameLength(first, vector);
    for (let i = 0; i < vector.length; i++) {
      sum[i] += vector[i];
    }
  }

  return sum.map((value) => value / vectors.length);
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  assertSameLength(a, b);
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot;
}

export function l2Norm(vector: readonly number[]): number {
  return Math.sqrt(dotProduct(vector, vector));
}

/**
 * Cosine similarity with explicit normalization; 0 when either side is the zero vector.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const dot = dotProduct(a, b);
  const normA = l2Norm(a);
  const normB = l2Norm(b);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (normA * normB);
}
