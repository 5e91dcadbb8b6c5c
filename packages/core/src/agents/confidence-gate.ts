import type { RetrievedChunk } from '../retrieval/index.js'

/** Best-score threshold below which the assistant asks a clarifying question. */
export const CONFIDENCE_THRESHOLD = 0.2

/**
 * True when there is nothing to answer from, or the best chunk scores strictly below the
 * threshold. Only the top score counts: a weak tail behind one strong hit does not matter.
 */
export function needsClarification(
  rankedChunks: readonly Pick<RetrievedChunk, 'score'>[],
  threshold: number = CONFIDENCE_THRESHOLD,
): boolean {
  if (rankedChunks.length === 0) return true
  let best = -Infinity
  for (const chunk of rankedChunks) {
    if (chunk.score > best) best = chunk.score
  }
  return best < threshold
}
