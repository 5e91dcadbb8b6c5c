/**
 * Safety — keyword intent classification and the assessment-answer block list.
 */

export { isBlocked, classifyIntent, toCategoryHint } from './intent.js'
export type { Intent } from './intent.js'
