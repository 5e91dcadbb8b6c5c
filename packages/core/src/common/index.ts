/**
 * Shared Result type and error class.
 */

export { Ok, Err, unwrap, fromPromise } from './result.js'
export type { Result } from './result.js'

export { TutorDeskError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'
