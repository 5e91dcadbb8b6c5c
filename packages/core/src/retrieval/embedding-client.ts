/**
 * Embedding client interface — framework-agnostic contract for vector embedding providers.
 * Implementations: HashingEmbeddingClient (local, deterministic) and OpenAIEmbeddingClient.
 */

import type { CorpusEntry } from '../corpus/index.js'

export interface EmbeddingClient {
  /** Embed one or more texts into vectors. Each vector is L2-normalized. */
  embed(texts: string[]): Promise<EmbedResult>
  readonly modelName: string
  readonly dimensions: number
  /** Format: "${provider}:${model}:${version}" */
  readonly providerFingerprint: string
}

export interface EmbedResult {
  /** Each vector already L2-normalized by the client, in input order. */
  embeddings: number[][]
}

/** Text embedded for a corpus entry: title, then tags, then body. */
export function entryEmbeddingText(entry: Pick<CorpusEntry, 'title' | 'tags' | 'content'>): string {
  return `${entry.title}. Tags: ${entry.tags.join(', ')}. ${entry.content}`
}
