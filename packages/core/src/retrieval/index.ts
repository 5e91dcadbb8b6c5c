/**
 * Retrieval — embedding index, candidate pooling, and category-aware reranking.
 */

export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export { entryEmbeddingText } from './embedding-client.js'
export { HashingEmbeddingClient, tokenize, fnv1a } from './hashing-embeddings.js'
export { OpenAIEmbeddingClient } from './openai-embeddings.js'
export { createEmbeddingClient } from './embedding-factory.js'
export type { EmbeddingProviderConfig } from './embedding-factory.js'
export { l2Normalize, cosineSimilarity, compareScored, topNBySimilarity } from './vector-search.js'
export type { ScoredPosition } from './vector-search.js'
export { EmbeddingIndex } from './embedding-index.js'
export type { IndexHit } from './embedding-index.js'
export { IndexHandle } from './index-handle.js'
export type { IndexLoader } from './index-handle.js'
export {
  candidatePoolSize,
  generateCandidates,
  hitToChunk,
  DEFAULT_POOL_MULTIPLIER,
  DEFAULT_POOL_FLOOR,
} from './candidate-pool.js'
export {
  isCategory,
  sortByScore,
  partitionByCategory,
  mergePartitions,
  rankCandidates,
} from './reranker.js'
export type { CategoryPartition } from './reranker.js'
export { Retriever } from './retriever.js'
export type { RetrieverOptions } from './retriever.js'
export type { RetrievedChunk, RankingOptions, CandidatePoolOptions } from './types.js'
