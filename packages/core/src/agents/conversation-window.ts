/**
 * Conversation windowing. The session log is never mutated here; every function returns a
 * new array.
 */

import type { ConversationTurn } from './provider.js'

export const DEFAULT_HISTORY_TURNS = 6

/** The last `maxTurns` turns in original order; a copy of all of them when there are fewer. */
export function windowTurns(history: readonly ConversationTurn[], maxTurns: number): ConversationTurn[] {
  const limit = Math.floor(maxTurns)
  if (limit <= 0) return []
  return history.slice(Math.max(0, history.length - limit))
}

/**
 * Window of *prior* turns for a new query.
 *
 * The session appends the current user turn before building context; that turn is dropped
 * here because the context assembler re-inserts it inside the augmented final message.
 * Nothing is dropped when the log is empty or its last turn is not from the user.
 */
export function priorTurnsWindow(history: readonly ConversationTurn[], maxTurns: number): ConversationTurn[] {
  const last = history[history.length - 1]
  const prior = last?.role === 'user' ? history.slice(0, -1) : history
  return windowTurns(prior, maxTurns)
}
