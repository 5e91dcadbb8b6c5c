import { describe, it, expect } from 'vitest'
import { validateResponse } from '../../src/agents/response-guard.js'
import { LEAKAGE_BLOCK_RESPONSE } from '../../src/agents/prompts.js'

describe('validateResponse', () => {
  it('passes ordinary platform guidance through', () => {
    expect(validateResponse('Each quiz allows three attempts per day.')).toEqual({
      safe: true,
      text: 'Each quiz allows three attempts per day.',
    })
  })

  it.each([
    'The correct answer is B.',
    'I think option c is correct here.',
    'Answer: d',
    'Question 4: photosynthesis',
    'The solution is to divide both sides by two.',
  ])('withholds a reply that leaks answers: %s', (reply) => {
    const result = validateResponse(reply)
    expect(result.safe).toBe(false)
    expect(result.text).toBe(LEAKAGE_BLOCK_RESPONSE)
  })

  it('reports the matched pattern', () => {
    const result = validateResponse('the right answer is A')
    expect(result).toEqual({
      safe: false,
      text: LEAKAGE_BLOCK_RESPONSE,
      pattern: '\\bthe (correct|right) answer is\\b',
    })
  })
})
