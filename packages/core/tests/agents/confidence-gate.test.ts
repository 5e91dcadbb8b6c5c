import { describe, it, expect } from 'vitest'
import { needsClarification, CONFIDENCE_THRESHOLD } from '../../src/agents/confidence-gate.js'

describe('needsClarification', () => {
  it('defaults to a threshold of 0.20', () => {
    expect(CONFIDENCE_THRESHOLD).toBe(0.2)
  })

  it('asks for clarification when nothing was retrieved', () => {
    expect(needsClarification([])).toBe(true)
  })

  it('asks for clarification when the best score is below the threshold', () => {
    expect(needsClarification([{ score: 0.05 }])).toBe(true)
    expect(needsClarification([{ score: 0.19 }, { score: 0.1 }])).toBe(true)
  })

  it('proceeds when the best score reaches the threshold', () => {
    expect(needsClarification([{ score: 0.2 }])).toBe(false)
  })

  it('looks only at the best score', () => {
    expect(needsClarification([{ score: 0.9 }, { score: 0.01 }])).toBe(false)
    expect(needsClarification([{ score: 0.01 }, { score: 0.9 }])).toBe(false)
  })

  it('accepts a custom threshold', () => {
    expect(needsClarification([{ score: 0.5 }], 0.6)).toBe(true)
  })
})
