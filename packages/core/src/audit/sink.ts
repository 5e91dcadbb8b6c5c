/**
 * Fire-and-forget interaction sink. A failed write is reported and dropped; it never
 * reaches the learner.
 */

import type { CreateInteractionInput } from './schemas.js'
import type { InteractionLogRepository } from './interaction-repository.js'

export interface InteractionSink {
  record(input: CreateInteractionInput): void
}

export class SqliteInteractionSink implements InteractionSink {
  constructor(private readonly repo: InteractionLogRepository) {}

  record(input: CreateInteractionInput): void {
    const result = this.repo.log(input)
    if (!result.ok) {
      console.warn(`[interaction-log] dropped entry: ${result.error.message}`)
    }
  }
}

/** Discards everything; for sessions that run without a database. */
export const NULL_SINK: InteractionSink = {
  record() {},
}
