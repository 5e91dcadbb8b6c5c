import type { Category } from '../corpus/index.js'

/** One ranked search result. Fields are copied from the source corpus entry. */
export interface RetrievedChunk {
  id: string
  title: string
  category: Category
  content: string
  tags: string[]
  /** Cosine similarity against the query vector, in [-1, 1]. */
  score: number
}

export interface RankingOptions {
  /**
   * When set, a same-category candidate only counts as preferred if its score reaches this floor.
   * Null partitions by category alone.
   */
  categoryScoreFloor?: number | null
}

export interface CandidatePoolOptions {
  multiplier?: number
  floor?: number
}
