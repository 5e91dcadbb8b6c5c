/**
 * Audit — anonymized interaction logging.
 */

export { InteractionLogRepository } from './interaction-repository.js'
export { SqliteInteractionSink, NULL_SINK } from './sink.js'
export type { InteractionSink } from './sink.js'
export { hashSessionId } from './session-hash.js'
export {
  InteractionIntentSchema,
  CreateInteractionInputSchema,
  InteractionEntrySchema,
} from './schemas.js'
export type {
  InteractionIntent,
  CreateInteractionInput,
  InteractionEntry,
  InteractionSummary,
} from './schemas.js'
