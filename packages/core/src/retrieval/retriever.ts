/**
 * Retriever — embeds the query, pulls a candidate pool from the shared index, and
 * reranks it with the category hint.
 */

import { Ok, Err, TutorDeskError, errorMessage, fromPromise } from '../common/index.js'
import type { Result } from '../common/index.js'
import { getCorpusStats } from '../corpus/index.js'
import type { CorpusStats } from '../corpus/index.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { EmbeddingIndex } from './embedding-index.js'
import type { IndexHandle } from './index-handle.js'
import { generateCandidates } from './candidate-pool.js'
import { rankCandidates } from './reranker.js'
import { l2Normalize } from './vector-search.js'
import type { CandidatePoolOptions, RankingOptions, RetrievedChunk } from './types.js'

export interface RetrieverOptions {
  pool?: CandidatePoolOptions
  ranking?: RankingOptions
}

export class Retriever {
  constructor(
    private readonly handle: IndexHandle,
    private readonly embeddingClient: EmbeddingClient,
    private readonly options: RetrieverOptions = {},
  ) {}

  /**
   * Returns exactly min(k, corpusSize) chunks, score descending.
   * Fails only when the index cannot be loaded or the query cannot be embedded.
   */
  async retrieve(
    query: string,
    categoryHint: string | null | undefined,
    k: number,
  ): Promise<Result<RetrievedChunk[], TutorDeskError>> {
    if (!Number.isInteger(k) || k <= 0) {
      return Err(TutorDeskError.validation(`k must be a positive integer, got ${k}`))
    }

    const loaded = await this.loadIndex()
    if (!loaded.ok) return loaded
    const index = loaded.value

    const startTime = Date.now()
    let queryVector: Float32Array
    try {
      const { embeddings } = await this.embeddingClient.embed([query])
      if (embeddings.length !== 1) {
        return Err(TutorDeskError.io(`Expected 1 query embedding, got ${embeddings.length}`))
      }
      queryVector = l2Normalize(embeddings[0])
    } catch (err) {
      return Err(TutorDeskError.io(`Query embedding failed: ${errorMessage(err)}`))
    }

    if (queryVector.length !== index.dimensions) {
      return Err(TutorDeskError.validation(
        `Query embedding has ${queryVector.length} dimensions, index has ${index.dimensions}`,
      ))
    }

    const candidates = generateCandidates(index, queryVector, k, this.options.pool)
    const ranked = rankCandidates(candidates, categoryHint, k, this.options.ranking)

    const topScores = ranked.slice(0, 3).map((c) => c.score.toFixed(3)).join(', ')
    console.log(
      `[retriever] ${ranked.length}/${k} chunks from pool of ${candidates.length} in ${Date.now() - startTime}ms` +
        ` (hint: ${categoryHint ?? 'none'}; top: ${topScores || '-'})`,
    )

    return Ok(ranked)
  }

  /** Corpus size and per-category counts. Builds the index if needed. */
  async getStats(): Promise<Result<CorpusStats, TutorDeskError>> {
    const loaded = await this.loadIndex()
    return loaded.ok ? Ok(getCorpusStats(loaded.value.entries)) : loaded
  }

  private loadIndex(): Promise<Result<EmbeddingIndex, TutorDeskError>> {
    return fromPromise(this.handle.get(), (err) =>
      err instanceof TutorDeskError ? err : TutorDeskError.load(errorMessage(err)),
    )
  }
}
