import { describe, it, expect } from 'vitest'
import {
  assembleContext,
  buildContext,
  renderChunk,
  renderHeader,
  renderAugmentedMessage,
  NO_CONTENT_CONTEXT,
  NO_CONTENT_NOTE,
} from '../../src/agents/context-assembler.js'
import type { RetrievedChunk } from '../../src/retrieval/types.js'
import type { ConversationTurn } from '../../src/agents/provider.js'

const RULE = '='.repeat(80)

const enroll: RetrievedChunk = {
  id: 'course-1',
  title: 'Enrolling',
  category: 'course',
  content: 'Select Enroll on the course page.',
  tags: ['enroll'],
  score: 0.87654,
}

const attempts: RetrievedChunk = {
  id: 'assessment-1',
  title: 'Quiz attempts',
  category: 'assessment',
  content: 'Each quiz allows three attempts.',
  tags: [],
  score: 0.4,
}

describe('renderChunk', () => {
  it('labels the chunk with index, category, title and rounded score', () => {
    expect(renderChunk(enroll, 1)).toBe(
      '[CHUNK 1 | Category: COURSE | Title: Enrolling | Relevance: 0.877]\nSelect Enroll on the course page.',
    )
  })
})

describe('renderHeader', () => {
  it('includes the hint only when one is given', () => {
    expect(renderHeader(2, 4, 'course')).toBe(
      'KNOWLEDGE BASE CONTEXT (2 chunks retrieved, top_k=4, ranked by relevance | category hint: course)',
    )
    expect(renderHeader(2, 4)).toBe('KNOWLEDGE BASE CONTEXT (2 chunks retrieved, top_k=4, ranked by relevance)')
  })
})

describe('renderAugmentedMessage', () => {
  it('lays out header, chunks, question and instructions', () => {
    const lines = renderAugmentedMessage({
      query: 'how do I enroll',
      rankedChunks: [enroll, attempts],
      categoryHint: 'course',
      k: 3,
    }).split('\n')

    expect(lines).toEqual([
      'KNOWLEDGE BASE CONTEXT (2 chunks retrieved, top_k=3, ranked by relevance | category hint: course)',
      RULE,
      '[CHUNK 1 | Category: COURSE | Title: Enrolling | Relevance: 0.877]',
      'Select Enroll on the course page.',
      '',
      '---',
      '',
      '[CHUNK 2 | Category: ASSESSMENT | Title: Quiz attempts | Relevance: 0.400]',
      'Each quiz allows three attempts.',
      RULE,
      '',
      'USER QUESTION: how do I enroll',
      '',
      'INSTRUCTIONS:',
      '- Synthesize information from ALL 2 chunks above to give a complete answer.',
      '- If multiple chunks cover different aspects, combine them coherently.',
      '- Use only the information in these chunks. Never fabricate platform details beyond them.',
      '- Do NOT reveal assessment answers or solve exam questions under any circumstances.',
    ])
  })

  it('uses the no-content note when nothing was retrieved', () => {
    const message = renderAugmentedMessage({ query: 'anything', rankedChunks: [], k: 4 })
    const lines = message.split('\n')
    expect(lines[0]).toBe('KNOWLEDGE BASE CONTEXT (0 chunks retrieved, top_k=4, ranked by relevance)')
    expect(lines[2]).toBe(NO_CONTENT_CONTEXT)
    expect(message.endsWith(`USER QUESTION: anything\n\n${NO_CONTENT_NOTE}`)).toBe(true)
  })
})

describe('assembleContext', () => {
  it('puts the window first and the augmented question last', () => {
    const window: ConversationTurn[] = [
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello! How can I help?' },
    ]
    const messages = assembleContext({ query: 'how do I enroll', rankedChunks: [enroll], window, k: 4 })
    expect(messages).toHaveLength(3)
    expect(messages.slice(0, 2)).toEqual(window)
    expect(messages[0]).not.toBe(window[0])
    expect(messages[2].role).toBe('user')
    expect(messages[2].content).toContain('USER QUESTION: how do I enroll')
  })
})

describe('buildContext', () => {
  it('excludes the in-flight query from the window', () => {
    const history: ConversationTurn[] = [
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello!' },
      { role: 'user', content: 'how do I enroll' },
    ]
    const messages = buildContext('how do I enroll', [enroll], history, 'course', 4)
    expect(messages.map((m) => m.role)).toEqual(['user', 'assistant', 'user'])
    expect(messages.filter((m) => m.content === 'how do I enroll')).toEqual([])
    expect(history).toHaveLength(3)
  })

  it('applies the turn limit', () => {
    const history: ConversationTurn[] = [
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
    ]
    const messages = buildContext('q3', [], history, undefined, 4, 2)
    expect(messages.map((m) => m.content.split('\n')[0])).toEqual([
      'q2',
      'a2',
      'KNOWLEDGE BASE CONTEXT (0 chunks retrieved, top_k=4, ranked by relevance)',
    ])
  })
})
