/**
 * Intent detection and safety filter.
 * A blocked query asks for assessment answers and never reaches retrieval. Otherwise the
 * first matching keyword layer names the category hint, in priority order.
 */

import type { Category } from '../corpus/index.js'

export type Intent = Category | 'general' | 'blocked'

// Assessment-solving requests
const BLOCKED_PATTERNS: readonly RegExp[] = [
  /\b(solve|answer|give me the answer|correct answer|solution)\b.*\b(question|quiz|exam|mcq|test|assignment)\b/,
  /\b(answer|solve)\b.*\b(question\s*\d+|q\d+)\b/,
  /\bwhat is the (correct|right) answer\b/,
  /\bgive.*answers?\b/,
  /\bsolve this\b/,
  /\banswer this (mcq|question|quiz|problem)\b/,
  /\bfill in the blank\b/,
  /\bcomplete the (sentence|question|following)\b/,
  /\bwhich option is (correct|right|the answer)\b/,
  /\bcheat/,
]

// Keyword layers, checked in this order. Leading word boundary only, so plurals and
// derived forms ("enrollment", "certificates") still match.
const INTENT_LAYERS: ReadonlyArray<readonly [Category, RegExp]> = [
  ['course', /\b(course|enrol|module|lesson|video|lecture|forum|refund|language|subtitle|note|bookmark|support)/],
  ['assessment', /\b(quiz|exam|assessment|assignment|grade|score|pass|fail|attempt|submit|proctor|feedback|plagiari)/],
  ['certification', /\b(certif|specialization|verif|download|share|employer|renewal|expir|re-enrol)/],
  ['progress', /\b(progress|completion|streak|activity|dashboard|sync|percent|log|gradebook|notification)/],
]

export function isBlocked(query: string): boolean {
  const q = query.toLowerCase()
  return BLOCKED_PATTERNS.some((re) => re.test(q))
}

export function classifyIntent(query: string): Intent {
  const q = query.toLowerCase()
  if (isBlocked(q)) return 'blocked'

  for (const [category, re] of INTENT_LAYERS) {
    if (re.test(q)) return category
  }
  return 'general'
}

/** The category hint for retrieval; general and blocked carry none. */
export function toCategoryHint(intent: Intent): Category | undefined {
  return intent === 'general' || intent === 'blocked' ? undefined : intent
}
