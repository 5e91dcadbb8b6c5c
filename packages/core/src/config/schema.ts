/**
 * Zod schema for application configuration. Every field has a default, so `{}` is a valid
 * configuration that runs fully offline with the hashing embedder.
 */

import { fileURLToPath } from 'node:url'
import { z } from 'zod'

/** The sample corpus shipped with the package; resolved from this module, not the working directory. */
export const BUNDLED_CORPUS_PATH = fileURLToPath(new URL('../../data/knowledge-base.json', import.meta.url))

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['hashing', 'openai']).default('hashing'),
  model: z.string().min(1).optional(),
  dimensions: z.number().int().positive().optional(),
  apiKey: z.string().min(1).optional(),
})

export const GeneratorConfigSchema = z.object({
  provider: z.enum(['openai', 'anthropic']).default('openai'),
  model: z.string().min(1).max(128).optional(),
  apiKey: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().default(600),
})

export const AppConfigSchema = z.object({
  corpusPath: z.string().min(1).default(BUNDLED_CORPUS_PATH),
  topK: z.number().int().min(1).max(8).default(4),
  confidenceThreshold: z.number().min(-1).max(1).default(0.2),
  pool: z
    .object({
      multiplier: z.number().int().positive().default(6),
      floor: z.number().int().nonnegative().default(20),
    })
    .default({}),
  /** Null partitions candidates by category alone. */
  categoryScoreFloor: z.number().min(-1).max(1).nullable().default(null),
  historyTurns: z.number().int().nonnegative().default(6),
  embedding: EmbeddingConfigSchema.default({}),
  generator: GeneratorConfigSchema.default({}),
  rateLimit: z
    .object({
      maxRequests: z.number().int().positive().default(10),
      windowMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  databasePath: z.string().min(1).default(':memory:'),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type AppConfigInput = z.input<typeof AppConfigSchema>
