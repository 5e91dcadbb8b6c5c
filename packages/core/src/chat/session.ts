/**
 * Chat session — one learner's conversation. Owns the turn log and runs each question
 * through block check → intent → retrieval → confidence gate → context → generation.
 */

import { v4 as uuidv4 } from 'uuid'
import { TutorDeskError } from '../common/index.js'
import type { Retriever, RetrievedChunk } from '../retrieval/index.js'
import {
  buildContext,
  generateAnswer,
  needsClarification,
  CLARIFICATION_RESPONSE,
  CONFIDENCE_THRESHOLD,
  DEFAULT_HISTORY_TURNS,
  SAFE_RESPONSE,
} from '../agents/index.js'
import type { ConversationTurn, GenerateOptions, LLMProvider } from '../agents/index.js'
import { classifyIntent, toCategoryHint } from '../safety/index.js'
import type { Intent } from '../safety/index.js'
import { hashSessionId, NULL_SINK } from '../audit/index.js'
import type { InteractionSink } from '../audit/index.js'
import type { FixedWindowRateLimiter } from './rate-limiter.js'

export interface SourceRef {
  title: string
  category: RetrievedChunk['category']
  score: number
}

export type AnswerOutcome =
  | { kind: 'rejected'; text: string }
  | { kind: 'rate_limited'; text: string; retryAfterMs: number }
  | { kind: 'blocked'; intent: 'blocked'; text: string }
  | { kind: 'clarification'; intent: Intent; text: string; chunks: RetrievedChunk[] }
  | {
      kind: 'answered'
      intent: Intent
      text: string
      sources: SourceRef[]
      retrievalMs: number
      latencyMs: number
      leakageBlocked: boolean
    }
  | { kind: 'error'; intent: Intent; text: string; error: TutorDeskError }

export interface ChatSessionOptions {
  retriever: Retriever
  /** Null when no generator is configured; questions that pass the gate then fail with an error outcome. */
  provider: LLMProvider | null
  sink?: InteractionSink
  sessionId?: string
  topK?: number
  confidenceThreshold?: number
  historyTurns?: number
  rateLimiter?: FixedWindowRateLimiter
  generateOptions?: GenerateOptions
  now?: () => number
}

export const EMPTY_QUERY_RESPONSE = 'Please type a question about the platform.'
export const GENERATOR_MISSING_MESSAGE = 'No text generator is configured. Set an API key for the generator provider.'

export class ChatSession {
  readonly sessionId: string
  private readonly turns: ConversationTurn[] = []
  private readonly userHash: string
  private readonly sink: InteractionSink
  private readonly now: () => number

  constructor(private readonly options: ChatSessionOptions) {
    this.sessionId = options.sessionId ?? uuidv4()
    this.userHash = hashSessionId(this.sessionId)
    this.sink = options.sink ?? NULL_SINK
    this.now = options.now ?? Date.now
  }

  /** Copy of the conversation so far. */
  history(): ConversationTurn[] {
    return this.turns.map((t) => ({ ...t }))
  }

  reset(): void {
    this.turns.length = 0
  }

  async ask(query: string, overrides: { topK?: number } = {}): Promise<AnswerOutcome> {
    if (query.trim() === '') {
      return { kind: 'rejected', text: EMPTY_QUERY_RESPONSE }
    }

    const limiter = this.options.rateLimiter
    if (limiter && !limiter.tryAcquire()) {
      const retryAfterMs = limiter.retryAfterMs()
      return {
        kind: 'rate_limited',
        text: `Rate limit reached (${limiter.maxRequests} questions per ${Math.round(limiter.windowMs / 1000)}s). Please wait.`,
        retryAfterMs,
      }
    }

    this.turns.push({ role: 'user', content: query })

    const intent = classifyIntent(query)
    if (intent === 'blocked') {
      this.reply(SAFE_RESPONSE)
      this.sink.record({
        userHash: this.userHash,
        queryLength: query.length,
        intent,
        safetyTriggered: true,
        responseLength: SAFE_RESPONSE.length,
      })
      return { kind: 'blocked', intent, text: SAFE_RESPONSE }
    }

    const k = overrides.topK ?? this.options.topK ?? 4
    const categoryHint = toCategoryHint(intent)

    const retrievalStart = this.now()
    const retrieved = await this.options.retriever.retrieve(query, categoryHint, k)
    const retrievalMs = this.now() - retrievalStart
    if (!retrieved.ok) {
      return this.fail(intent, retrieved.error)
    }
    const chunks = retrieved.value

    if (needsClarification(chunks, this.options.confidenceThreshold ?? CONFIDENCE_THRESHOLD)) {
      this.reply(CLARIFICATION_RESPONSE)
      this.sink.record({
        userHash: this.userHash,
        queryLength: query.length,
        intent,
        responseLength: CLARIFICATION_RESPONSE.length,
      })
      return { kind: 'clarification', intent, text: CLARIFICATION_RESPONSE, chunks }
    }

    const provider = this.options.provider
    if (!provider) {
      return this.fail(intent, TutorDeskError.llm(GENERATOR_MISSING_MESSAGE))
    }

    const messages = buildContext(
      query,
      chunks,
      this.turns,
      categoryHint,
      k,
      this.options.historyTurns ?? DEFAULT_HISTORY_TURNS,
    )

    const generated = await generateAnswer(provider, messages, this.options.generateOptions)
    if (!generated.ok) {
      return this.fail(intent, generated.error)
    }

    const { text, latencyMs, leakageBlocked } = generated.value
    this.reply(text)
    this.sink.record({
      userHash: this.userHash,
      queryLength: query.length,
      intent,
      retrievedTitles: chunks.map((c) => c.title),
      latencyMs,
      responseLength: text.length,
    })

    return {
      kind: 'answered',
      intent,
      text,
      sources: chunks.map(({ title, category, score }) => ({ title, category, score })),
      retrievalMs,
      latencyMs,
      leakageBlocked,
    }
  }

  private reply(content: string): void {
    this.turns.push({ role: 'assistant', content })
  }

  private fail(intent: Intent, error: TutorDeskError): AnswerOutcome {
    console.error(`[chat] ${error.code}: ${error.message}`)
    const text = `Sorry, something went wrong while answering: ${error.message}`
    this.reply(text)
    return { kind: 'error', intent, text, error }
  }
}
