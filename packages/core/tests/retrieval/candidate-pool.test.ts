import { describe, it, expect } from 'vitest'
import {
  candidatePoolSize,
  generateCandidates,
  DEFAULT_POOL_FLOOR,
  DEFAULT_POOL_MULTIPLIER,
} from '../../src/retrieval/candidate-pool.js'
import { EmbeddingIndex } from '../../src/retrieval/embedding-index.js'
import type { EmbeddingClient } from '../../src/retrieval/embedding-client.js'
import { l2Normalize } from '../../src/retrieval/vector-search.js'
import type { CorpusEntry } from '../../src/corpus/schemas.js'

describe('candidatePoolSize', () => {
  it('uses the defaults of 6 per slot with a floor of 20', () => {
    expect(DEFAULT_POOL_MULTIPLIER).toBe(6)
    expect(DEFAULT_POOL_FLOOR).toBe(20)
    expect(candidatePoolSize(1, 100)).toBe(20)
    expect(candidatePoolSize(4, 100)).toBe(24)
    expect(candidatePoolSize(10, 1000)).toBe(60)
  })

  it('never exceeds the corpus size', () => {
    expect(candidatePoolSize(4, 10)).toBe(10)
    expect(candidatePoolSize(3, 8)).toBe(8)
    expect(candidatePoolSize(3, 0)).toBe(0)
  })

  it('honours overrides', () => {
    expect(candidatePoolSize(2, 100, { multiplier: 3, floor: 5 })).toBe(6)
    expect(candidatePoolSize(1, 100, { multiplier: 3, floor: 5 })).toBe(5)
  })
})

describe('generateCandidates', () => {
  it('returns the pool in raw similarity order with copied fields', async () => {
    const entries = Array.from({ length: 30 }, (_, i): CorpusEntry => ({
      id: `e${i}`,
      title: `Entry ${i}`,
      category: i % 2 === 0 ? 'course' : 'assessment',
      content: `Body ${i}`,
      tags: [`t${i}`],
    }))
    // Entry i points at angle i degrees, so similarity to [1, 0] falls with i.
    const client: EmbeddingClient = {
      modelName: 'angle',
      dimensions: 2,
      providerFingerprint: 'angle:angle:1',
      async embed(texts) {
        return {
          embeddings: texts.map((text) => {
            const n = Number(/Entry (\d+)/.exec(text)?.[1] ?? 0)
            const rad = (n * Math.PI) / 180
            return [Math.cos(rad), Math.sin(rad)]
          }),
        }
      },
    }
    const built = await EmbeddingIndex.build(entries, client)
    if (!built.ok) throw built.error

    const candidates = generateCandidates(built.value, l2Normalize([1, 0]), 1)
    expect(candidates).toHaveLength(20)
    expect(candidates.map((c) => c.id)).toEqual(Array.from({ length: 20 }, (_, i) => `e${i}`))
    expect(candidates[3]).toMatchObject({
      id: 'e3',
      title: 'Entry 3',
      category: 'assessment',
      content: 'Body 3',
      tags: ['t3'],
    })
    expect(candidates[3].tags).not.toBe(entries[3].tags)

    expect(generateCandidates(built.value, l2Normalize([1, 0]), 5)).toHaveLength(30)
  })
})
