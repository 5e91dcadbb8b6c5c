/**
 * Embedding provider resolution. 'hashing' runs locally; 'openai' requires an explicit key.
 */

import type { EmbeddingClient } from './embedding-client.js'
import { HashingEmbeddingClient } from './hashing-embeddings.js'
import { OpenAIEmbeddingClient } from './openai-embeddings.js'

export interface EmbeddingProviderConfig {
  provider: 'hashing' | 'openai'
  model?: string
  dimensions?: number
  apiKey?: string
}

export function createEmbeddingClient(config: EmbeddingProviderConfig): EmbeddingClient {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbeddingClient({ dimensions: config.dimensions })
    case 'openai': {
      if (!config.apiKey) throw new Error('OpenAI embeddings require an API key')
      return new OpenAIEmbeddingClient({
        apiKey: config.apiKey,
        model: config.model,
        dimensions: config.dimensions,
      })
    }
    default: {
      const _exhaustive: never = config.provider
      throw new Error(`Unknown embedding provider: ${_exhaustive}`)
    }
  }
}
