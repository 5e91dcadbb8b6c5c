/**
 * Post-generation check for assessment-answer leakage.
 */

import { LEAKAGE_BLOCK_RESPONSE } from './prompts.js'

const ANSWER_LEAKAGE_PATTERNS: readonly RegExp[] = [
  /\bthe (correct|right) answer is\b/i,
  /\boption [a-d] is correct\b/i,
  /\banswer\s*[:=]\s*[a-d]\b/i,
  /\bquestion \d+\s*[:=]/i,
  /\bthe solution is\b/i,
]

export type GuardedResponse =
  | { safe: true; text: string }
  | { safe: false; text: string; pattern: string }

export function validateResponse(text: string): GuardedResponse {
  const hit = ANSWER_LEAKAGE_PATTERNS.find((re) => re.test(text))
  if (hit) {
    return { safe: false, text: LEAKAGE_BLOCK_RESPONSE, pattern: hit.source }
  }
  return { safe: true, text }
}
