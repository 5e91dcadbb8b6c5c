/**
 * Interaction log repository — one anonymized row per answered, clarified or blocked question.
 * Stores lengths and titles only; the raw query and reply are never persisted.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, TutorDeskError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import {
  CreateInteractionInputSchema,
  InteractionEntrySchema,
  InteractionIntentSchema,
} from './schemas.js'
import type {
  CreateInteractionInput,
  InteractionEntry,
  InteractionIntent,
  InteractionSummary,
} from './schemas.js'

interface InteractionRow {
  id: string
  user_hash: string
  query_length: number
  intent: string
  retrieved_titles: string
  latency_ms: number
  safety_triggered: number
  response_length: number
  created_at: string
}

function rowToEntry(row: InteractionRow): Result<InteractionEntry, TutorDeskError> {
  let retrievedTitles: unknown
  try {
    retrievedTitles = JSON.parse(row.retrieved_titles)
  } catch (e) {
    return Err(TutorDeskError.db(`Invalid interaction row ${row.id}: ${errorMessage(e)}`))
  }

  const parsed = InteractionEntrySchema.safeParse({
    id: row.id,
    userHash: row.user_hash,
    queryLength: row.query_length,
    intent: row.intent,
    retrievedTitles,
    latencyMs: row.latency_ms,
    safetyTriggered: row.safety_triggered === 1,
    responseLength: row.response_length,
    createdAt: row.created_at,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return Err(TutorDeskError.db(`Invalid interaction row ${row.id}: ${issue.path.join('.')} ${issue.message}`))
  }
  return Ok(parsed.data)
}

function rowsToEntries(rows: InteractionRow[]): Result<InteractionEntry[], TutorDeskError> {
  const entries: InteractionEntry[] = []
  for (const row of rows) {
    const entry = rowToEntry(row)
    if (!entry.ok) return entry
    entries.push(entry.value)
  }
  return Ok(entries)
}

export class InteractionLogRepository {
  constructor(private db: Database.Database) {}

  log(input: CreateInteractionInput): Result<InteractionEntry, TutorDeskError> {
    const parsed = CreateInteractionInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(TutorDeskError.validation(parsed.error.message))
    }

    const entry: InteractionEntry = {
      id: uuidv4(),
      ...parsed.data,
      latencyMs: Math.round(parsed.data.latencyMs),
      createdAt: new Date().toISOString(),
    }

    try {
      this.db
        .prepare(
          'INSERT INTO interaction_log (id, user_hash, query_length, intent, retrieved_titles, latency_ms, safety_triggered, response_length, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
        )
        .run(
          entry.id,
          entry.userHash,
          entry.queryLength,
          entry.intent,
          JSON.stringify(entry.retrievedTitles),
          entry.latencyMs,
          entry.safetyTriggered ? 1 : 0,
          entry.responseLength,
          entry.createdAt,
        )
      return Ok(entry)
    } catch (e) {
      return Err(TutorDeskError.db(errorMessage(e)))
    }
  }

  listRecent(limit = 50): Result<InteractionEntry[], TutorDeskError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM interaction_log ORDER BY created_at DESC, rowid DESC LIMIT ?')
        .all(limit) as InteractionRow[]
      return rowsToEntries(rows)
    } catch (e) {
      return Err(TutorDeskError.db(errorMessage(e)))
    }
  }

  listByIntent(intent: InteractionIntent, limit = 50): Result<InteractionEntry[], TutorDeskError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM interaction_log WHERE intent = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
        .all(intent, limit) as InteractionRow[]
      return rowsToEntries(rows)
    } catch (e) {
      return Err(TutorDeskError.db(errorMessage(e)))
    }
  }

  summarize(): Result<InteractionSummary, TutorDeskError> {
    try {
      const rows = this.db
        .prepare('SELECT intent, COUNT(*) as count, SUM(safety_triggered) as triggered FROM interaction_log GROUP BY intent')
        .all() as Array<{ intent: string; count: number; triggered: number | null }>

      const summary: InteractionSummary = { total: 0, safetyTriggered: 0, byIntent: {} }
      for (const row of rows) {
        const intent = InteractionIntentSchema.safeParse(row.intent)
        if (intent.success) summary.byIntent[intent.data] = row.count
        summary.total += row.count
        summary.safetyTriggered += row.triggered ?? 0
      }
      return Ok(summary)
    } catch (e) {
      return Err(TutorDeskError.db(errorMessage(e)))
    }
  }
}
