/**
 * Candidate pool: more nearest neighbours than the final result size, for the reranker
 * to choose from.
 */

import type { EmbeddingIndex, IndexHit } from './embedding-index.js'
import type { CandidatePoolOptions, RetrievedChunk } from './types.js'

export const DEFAULT_POOL_MULTIPLIER = 6
export const DEFAULT_POOL_FLOOR = 20

/** P = clamp(k * multiplier, floor, corpusSize). */
export function candidatePoolSize(
  k: number,
  corpusSize: number,
  options: CandidatePoolOptions = {},
): number {
  const { multiplier = DEFAULT_POOL_MULTIPLIER, floor = DEFAULT_POOL_FLOOR } = options
  return Math.max(0, Math.min(Math.max(k * multiplier, floor), corpusSize))
}

export function hitToChunk(hit: IndexHit): RetrievedChunk {
  return {
    id: hit.entry.id,
    title: hit.entry.title,
    category: hit.entry.category,
    content: hit.entry.content,
    tags: [...hit.entry.tags],
    score: hit.score,
  }
}

/** Raw similarity-ordered candidates; no category logic applied. */
export function generateCandidates(
  index: EmbeddingIndex,
  queryVector: Float32Array,
  k: number,
  options: CandidatePoolOptions = {},
): RetrievedChunk[] {
  const poolSize = candidatePoolSize(k, index.size, options)
  return index.search(queryVector, poolSize).map(hitToChunk)
}
