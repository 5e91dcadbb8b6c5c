/**
 * Normalization, cosine similarity and stable top-N selection.
 */

/** Scale a vector to unit length. A zero vector is returned unchanged. */
export function l2Normalize(vec: ArrayLike<number>): Float32Array {
  const out = Float32Array.from(vec)
  let norm = 0
  for (let i = 0; i < out.length; i++) {
    norm += out[i] * out[i]
  }
  norm = Math.sqrt(norm)
  if (norm === 0) return out
  for (let i = 0; i < out.length; i++) {
    out[i] = out[i] / norm
  }
  return out
}

/** Cosine similarity between two L2-normalized Float32Arrays. For normalized vectors, this is just the dot product. */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
  }
  return dot
}

export interface ScoredPosition {
  /** Position of the vector in the searched list (corpus insertion order). */
  position: number
  score: number
}

/** Score descending; equal scores keep insertion order. */
export function compareScored(a: ScoredPosition, b: ScoredPosition): number {
  return b.score - a.score || a.position - b.position
}

/**
 * Exact nearest-neighbour search: scores every vector and returns the best `n`.
 * `n` is clamped to [0, vectors.length].
 */
export function topNBySimilarity(
  query: Float32Array,
  vectors: readonly Float32Array[],
  n: number,
): ScoredPosition[] {
  const limit = Math.max(0, Math.min(Math.floor(n), vectors.length))
  if (limit === 0) return []

  const scored: ScoredPosition[] = vectors.map((vec, position) => ({
    position,
    score: cosineSimilarity(query, vec),
  }))
  scored.sort(compareScored)
  return scored.slice(0, limit)
}
