/**
 * Generator invocation with rate-limit retries and the leakage guard applied to the reply.
 */

import { Ok, Err, TutorDeskError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { GenerationSettings, LLMProvider, PromptMessage } from './provider.js'
import { isRateLimitError } from './provider.js'
import { GENERATION_SETTINGS, SYSTEM_PROMPT } from './prompts.js'
import { validateResponse } from './response-guard.js'

export interface GenerateOptions {
  systemPrompt?: string
  settings?: GenerationSettings
  /** Extra attempts after the first, used only for rate-limit failures. */
  retries?: number
  baseDelayMs?: number
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export interface GeneratedAnswer {
  text: string
  /** Latency of the successful attempt. */
  latencyMs: number
  attempts: number
  leakageBlocked: boolean
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

export async function generateAnswer(
  provider: LLMProvider,
  messages: PromptMessage[],
  options: GenerateOptions = {},
): Promise<Result<GeneratedAnswer, TutorDeskError>> {
  const {
    systemPrompt = SYSTEM_PROMPT,
    settings = GENERATION_SETTINGS,
    retries = 2,
    baseDelayMs = 1000,
    sleep = defaultSleep,
    now = Date.now,
  } = options

  for (let attempt = 0; ; attempt++) {
    const start = now()
    const result = await provider.chatComplete(messages, systemPrompt, settings)
    const latencyMs = now() - start

    if (result.ok) {
      const guarded = validateResponse(result.value)
      if (!guarded.safe) {
        console.warn(`[generation] reply withheld, matched leakage pattern /${guarded.pattern}/`)
      }
      return Ok({ text: guarded.text, latencyMs, attempts: attempt + 1, leakageBlocked: !guarded.safe })
    }

    if (!isRateLimitError(result.error)) {
      return Err(result.error)
    }
    if (attempt >= retries) {
      return Err(TutorDeskError.rateLimited(result.error.message))
    }

    const delay = baseDelayMs * 2 ** attempt
    console.warn(`[generation] ${provider.name} rate limited, retrying in ${delay}ms (attempt ${attempt + 1}/${retries + 1})`)
    await sleep(delay)
  }
}
