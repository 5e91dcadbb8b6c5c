/**
 * Configuration loading from environment variables (TUTORDESK_*, plus the providers' own
 * API key variables).
 */

import { Ok, Err, TutorDeskError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { AppConfigSchema } from './schema.js'
import type { AppConfig } from './schema.js'

type Env = Record<string, string | undefined>

function str(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/** Unset or blank → undefined (schema default applies); anything else → Number, so junk fails validation. */
function num(value: string | undefined): number | undefined {
  const s = str(value)
  return s === undefined ? undefined : Number(s)
}

function nullableNum(value: string | undefined): number | null | undefined {
  const s = str(value)
  if (s === undefined) return undefined
  if (s.toLowerCase() === 'none' || s.toLowerCase() === 'off') return null
  return Number(s)
}

export function parseConfig(raw: unknown): Result<AppConfig, TutorDeskError> {
  const parsed = AppConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    return Err(TutorDeskError.validation(`Invalid configuration: ${where}${issue?.message ?? parsed.error.message}`))
  }
  return Ok(parsed.data)
}

export function loadConfigFromEnv(env: Env = process.env): Result<AppConfig, TutorDeskError> {
  const generatorProvider = str(env.TUTORDESK_GENERATOR_PROVIDER)
  const generatorKey = generatorProvider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY

  return parseConfig({
    corpusPath: str(env.TUTORDESK_CORPUS_PATH),
    topK: num(env.TUTORDESK_TOP_K),
    confidenceThreshold: num(env.TUTORDESK_CONFIDENCE_THRESHOLD),
    pool: {
      multiplier: num(env.TUTORDESK_POOL_MULTIPLIER),
      floor: num(env.TUTORDESK_POOL_FLOOR),
    },
    categoryScoreFloor: nullableNum(env.TUTORDESK_CATEGORY_SCORE_FLOOR),
    historyTurns: num(env.TUTORDESK_HISTORY_TURNS),
    embedding: {
      provider: str(env.TUTORDESK_EMBEDDING_PROVIDER),
      model: str(env.TUTORDESK_EMBEDDING_MODEL),
      dimensions: num(env.TUTORDESK_EMBEDDING_DIMENSIONS),
      apiKey: str(env.OPENAI_API_KEY),
    },
    generator: {
      provider: generatorProvider,
      model: str(env.TUTORDESK_GENERATOR_MODEL),
      apiKey: str(generatorKey),
      maxTokens: num(env.TUTORDESK_MAX_TOKENS),
    },
    rateLimit: {
      maxRequests: num(env.TUTORDESK_RATE_LIMIT),
      windowMs: num(env.TUTORDESK_RATE_WINDOW_MS),
    },
    databasePath: str(env.TUTORDESK_DATABASE_PATH),
  })
}
