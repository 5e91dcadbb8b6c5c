/**
 * In-memory embedding index over the corpus.
 * Built once from the full corpus; read-only afterwards, so concurrent searches need no locking.
 */

import { Ok, Err, TutorDeskError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { CorpusEntry } from '../corpus/index.js'
import { entryEmbeddingText } from './embedding-client.js'
import type { EmbeddingClient } from './embedding-client.js'
import { l2Normalize, topNBySimilarity } from './vector-search.js'

const EMBED_BATCH_SIZE = 32

export interface IndexHit {
  entry: CorpusEntry
  /** Corpus insertion order; ties in score are broken by this. */
  position: number
  score: number
}

export class EmbeddingIndex {
  private constructor(
    private readonly _entries: readonly CorpusEntry[],
    private readonly vectors: readonly Float32Array[],
    readonly dimensions: number,
    readonly providerFingerprint: string,
  ) {}

  /**
   * Embed every entry (title + tags + body) and build the index.
   * Fails with LOAD_ERROR rather than ever returning a partial index.
   */
  static async build(
    entries: readonly CorpusEntry[],
    embeddingClient: EmbeddingClient,
  ): Promise<Result<EmbeddingIndex, TutorDeskError>> {
    if (entries.length === 0) {
      return Err(TutorDeskError.load('Cannot build index: corpus is empty'))
    }

    const startTime = Date.now()
    const texts = entries.map(entryEmbeddingText)
    const vectors: Float32Array[] = []

    try {
      for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
        const batch = texts.slice(i, i + EMBED_BATCH_SIZE)
        const { embeddings } = await embeddingClient.embed(batch)
        if (embeddings.length !== batch.length) {
          return Err(TutorDeskError.load(
            `Embedding client returned ${embeddings.length} vectors for ${batch.length} entries`,
          ))
        }
        for (const embedding of embeddings) {
          vectors.push(l2Normalize(embedding))
        }
      }
    } catch (err) {
      return Err(TutorDeskError.load(`Embedding corpus failed: ${errorMessage(err)}`))
    }

    const dimensions = vectors[0].length
    if (dimensions === 0) {
      return Err(TutorDeskError.load('Embedding client returned zero-dimension vectors'))
    }
    const mismatch = vectors.findIndex((v) => v.length !== dimensions)
    if (mismatch !== -1) {
      return Err(TutorDeskError.load(
        `Inconsistent embedding dimensions: entry ${entries[mismatch].id} has ${vectors[mismatch].length}, expected ${dimensions}`,
      ))
    }

    console.log(
      `[index] ready: ${entries.length} entries, dim=${dimensions}, ${Date.now() - startTime}ms (${embeddingClient.providerFingerprint})`,
    )
    return Ok(new EmbeddingIndex([...entries], vectors, dimensions, embeddingClient.providerFingerprint))
  }

  get size(): number {
    return this._entries.length
  }

  get entries(): readonly CorpusEntry[] {
    return this._entries
  }

  /** The `n` most similar entries, score descending, ties in corpus order. */
  search(queryVector: Float32Array, n: number): IndexHit[] {
    if (queryVector.length !== this.dimensions) {
      throw TutorDeskError.validation(
        `Query vector has ${queryVector.length} dimensions, index has ${this.dimensions}`,
      )
    }
    return topNBySimilarity(queryVector, this.vectors, n).map(({ position, score }) => ({
      entry: this._entries[position],
      position,
      score,
    }))
  }
}
