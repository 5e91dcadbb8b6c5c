/**
 * Session orchestration and process-wide wiring.
 */

export { ChatSession, EMPTY_QUERY_RESPONSE, GENERATOR_MISSING_MESSAGE } from './session.js'
export type { AnswerOutcome, ChatSessionOptions, SourceRef } from './session.js'
export { FixedWindowRateLimiter } from './rate-limiter.js'
export { AppContext } from './app-context.js'
export type { AppDependencies } from './app-context.js'
