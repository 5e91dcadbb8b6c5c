/**
 * Category-aware reranking. A category hint is a soft preference: it decides which
 * candidates make the cut, never the final order, and never leaves slots empty while
 * other candidates exist.
 */

import { CATEGORIES } from '../corpus/index.js'
import type { Category } from '../corpus/index.js'
import type { RankingOptions, RetrievedChunk } from './types.js'

const VALID_CATEGORIES: ReadonlySet<string> = new Set(CATEGORIES)

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && VALID_CATEGORIES.has(value)
}

/** Stable score-descending copy. */
export function sortByScore(chunks: readonly RetrievedChunk[]): RetrievedChunk[] {
  return chunks
    .map((chunk, order) => ({ chunk, order }))
    .sort((a, b) => b.chunk.score - a.chunk.score || a.order - b.order)
    .map(({ chunk }) => chunk)
}

export interface CategoryPartition {
  preferred: RetrievedChunk[]
  others: RetrievedChunk[]
}

/** Split candidates on category; both halves come back score-descending. */
export function partitionByCategory(
  candidates: readonly RetrievedChunk[],
  hint: Category,
  options: RankingOptions = {},
): CategoryPartition {
  const floor = options.categoryScoreFloor ?? null
  const preferred: RetrievedChunk[] = []
  const others: RetrievedChunk[] = []
  for (const chunk of sortByScore(candidates)) {
    const matches = chunk.category === hint && (floor === null || chunk.score >= floor)
    if (matches) preferred.push(chunk)
    else others.push(chunk)
  }
  return { preferred, others }
}

/**
 * Quota merge over two pre-sorted partitions: up to k from preferred, the remainder
 * from others, re-sorted by score.
 */
export function mergePartitions(
  preferred: readonly RetrievedChunk[],
  others: readonly RetrievedChunk[],
  k: number,
): RetrievedChunk[] {
  const quota = Math.max(0, Math.floor(k))
  const fromPreferred = Math.min(quota, preferred.length)
  const fromOthers = Math.min(quota - fromPreferred, others.length)
  return sortByScore([
    ...preferred.slice(0, fromPreferred),
    ...others.slice(0, fromOthers),
  ])
}

/**
 * Exactly min(k, candidates.length) chunks, score descending.
 * An absent or unknown hint falls back to pure similarity.
 */
export function rankCandidates(
  candidates: readonly RetrievedChunk[],
  categoryHint: string | null | undefined,
  k: number,
  options: RankingOptions = {},
): RetrievedChunk[] {
  if (candidates.length === 0 || k <= 0) return []

  if (!isCategory(categoryHint)) {
    return mergePartitions([], sortByScore(candidates), k)
  }

  const { preferred, others } = partitionByCategory(candidates, categoryHint, options)
  return mergePartitions(preferred, others, k)
}
