/**
 * Context assembler — merges ranked chunks and the prior-turn window into the exact message
 * sequence handed to the generator: window turns first, then one augmented user message.
 */

import type { RetrievedChunk } from '../retrieval/index.js'
import type { ConversationTurn, PromptMessage } from './provider.js'
import { priorTurnsWindow, DEFAULT_HISTORY_TURNS } from './conversation-window.js'

const RULE = '='.repeat(80)
const CHUNK_SEPARATOR = '\n\n---\n\n'

export const NO_CONTENT_CONTEXT = 'No knowledge-base content was found for this question.'

export const NO_CONTENT_NOTE = `NOTE:
- No knowledge-base content matched this question.
- Do not guess platform details. Say what information is missing and ask the learner to rephrase or add detail.`

export interface AssembleInput {
  query: string
  rankedChunks: readonly RetrievedChunk[]
  /** Prior turns only; the current query must not be in here. */
  window: readonly ConversationTurn[]
  categoryHint?: string | null
  k: number
}

export function renderChunk(chunk: RetrievedChunk, index: number): string {
  return (
    `[CHUNK ${index} | Category: ${chunk.category.toUpperCase()} | Title: ${chunk.title} | Relevance: ${chunk.score.toFixed(3)}]\n` +
    chunk.content
  )
}

export function renderHeader(chunkCount: number, k: number, categoryHint?: string | null): string {
  const hint = categoryHint ? ` | category hint: ${categoryHint}` : ''
  return `KNOWLEDGE BASE CONTEXT (${chunkCount} chunks retrieved, top_k=${k}, ranked by relevance${hint})`
}

export function renderInstructions(chunkCount: number): string {
  return `INSTRUCTIONS:
- Synthesize information from ALL ${chunkCount} chunks above to give a complete answer.
- If multiple chunks cover different aspects, combine them coherently.
- Use only the information in these chunks. Never fabricate platform details beyond them.
- Do NOT reveal assessment answers or solve exam questions under any circumstances.`
}

/** The final user message: header, numbered chunks, the question, then instructions or the no-content note. */
export function renderAugmentedMessage(input: Omit<AssembleInput, 'window'>): string {
  const { query, rankedChunks, categoryHint, k } = input
  const count = rankedChunks.length
  const context = count > 0
    ? rankedChunks.map((chunk, i) => renderChunk(chunk, i + 1)).join(CHUNK_SEPARATOR)
    : NO_CONTENT_CONTEXT
  const closing = count > 0 ? renderInstructions(count) : NO_CONTENT_NOTE

  return [
    renderHeader(count, k, categoryHint),
    RULE,
    context,
    RULE,
    '',
    `USER QUESTION: ${query}`,
    '',
    closing,
  ].join('\n')
}

export function assembleContext(input: AssembleInput): PromptMessage[] {
  return [
    ...input.window.map((turn) => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: renderAugmentedMessage(input) },
  ]
}

/** Window the session log (dropping the in-flight query) and assemble the prompt. */
export function buildContext(
  query: string,
  rankedChunks: readonly RetrievedChunk[],
  history: readonly ConversationTurn[],
  categoryHint: string | null | undefined,
  k: number,
  maxTurns: number = DEFAULT_HISTORY_TURNS,
): PromptMessage[] {
  return assembleContext({
    query,
    rankedChunks,
    window: priorTurnsWindow(history, maxTurns),
    categoryHint,
    k,
  })
}
