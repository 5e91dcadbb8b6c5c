/**
 * OpenAI embedding client — calls OpenAI embeddings API with L2 normalization.
 */

import OpenAI from 'openai'
import type { EmbeddingClient, EmbedResult } from './embedding-client.js'
import { l2Normalize } from './vector-search.js'

const MAX_BATCH_SIZE = 2048

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  private readonly client: OpenAI

  constructor(options: {
    apiKey: string
    model?: string
    dimensions?: number
    baseUrl?: string
  }) {
    this.modelName = options.model ?? 'text-embedding-3-small'
    this.dimensions = options.dimensions ?? 1536
    this.providerFingerprint = `openai:${this.modelName}:${this.dimensions}`
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
  }

  async embed(texts: string[]): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE)
      const response = await this.client.embeddings.create({
        model: this.modelName,
        input: batch,
        dimensions: this.dimensions,
      })

      // API may return items out of order
      const sorted = [...response.data].sort((a, b) => a.index - b.index)
      for (const item of sorted) {
        allEmbeddings.push(Array.from(l2Normalize(item.embedding)))
      }
    }

    return { embeddings: allEmbeddings }
  }
}
