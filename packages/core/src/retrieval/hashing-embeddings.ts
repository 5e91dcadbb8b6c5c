/**
 * Hashing embedding client — deterministic local embeddings with no model download.
 * Word unigrams and bigrams are hashed (FNV-1a) into a fixed number of signed buckets,
 * then L2-normalized. Identical text always yields an identical vector.
 */

import type { EmbeddingClient, EmbedResult } from './embedding-client.js'
import { l2Normalize } from './vector-search.js'

const DEFAULT_DIMENSIONS = 384
const BIGRAM_WEIGHT = 0.5

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'can', 'do', 'does', 'for', 'how', 'i',
  'in', 'is', 'it', 'me', 'my', 'of', 'on', 'or', 'the', 'to', 'what', 'with',
])

/** Lowercased alphanumeric word tokens, stop words removed. */
export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? []
  return words.filter((w) => !STOP_WORDS.has(w))
}

/** 32-bit FNV-1a hash of a string. */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}

export class HashingEmbeddingClient implements EmbeddingClient {
  readonly modelName = 'hashing-ngram'
  readonly dimensions: number
  readonly providerFingerprint: string

  constructor(options: { dimensions?: number } = {}) {
    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS
    if (!Number.isInteger(this.dimensions) || this.dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer, got ${this.dimensions}`)
    }
    this.providerFingerprint = `hashing:${this.modelName}:${this.dimensions}`
  }

  async embed(texts: string[]): Promise<EmbedResult> {
    return { embeddings: texts.map((t) => this.embedOne(t)) }
  }

  embedOne(text: string): number[] {
    const vec = new Float32Array(this.dimensions)
    const tokens = tokenize(text)

    const add = (feature: string, weight: number): void => {
      const hash = fnv1a(feature)
      const bucket = hash % this.dimensions
      const sign = (hash >>> 31) === 0 ? 1 : -1
      vec[bucket] += sign * weight
    }

    for (let i = 0; i < tokens.length; i++) {
      add(tokens[i], 1)
      if (i > 0) add(`${tokens[i - 1]} ${tokens[i]}`, BIGRAM_WEIGHT)
    }

    return Array.from(l2Normalize(vec))
  }
}
