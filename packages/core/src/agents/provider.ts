/**
 * Generator contract. The pipeline hands an ordered message list to an LLMProvider and
 * knows nothing else about how the text is produced.
 */

import type { Result } from '../common/index.js'
import type { TutorDeskError } from '../common/index.js'

export type ChatRole = 'user' | 'assistant'

/** One conversation turn, as accumulated by a session. */
export interface ConversationTurn {
  role: ChatRole
  content: string
}

/** One message of an assembled prompt. Same shape as a turn; produced only by the context assembler. */
export type PromptMessage = ConversationTurn

export interface GenerationSettings {
  temperature?: number
  topP?: number
  maxTokens?: number
  stopSequences?: string[]
}

export interface LLMProvider {
  readonly name: string
  chatComplete(
    messages: PromptMessage[],
    systemPrompt: string,
    settings?: GenerationSettings,
  ): Promise<Result<string, TutorDeskError>>
}

const RATE_LIMIT_RE = /\b429\b|rate.?limit|too many requests/i

/** True when a provider failure looks like a rate limit and may succeed on retry. */
export function isRateLimitError(err: { message: string }): boolean {
  return RATE_LIMIT_RE.test(err.message)
}
