/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Interaction log: anonymized per-question records',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS interaction_log (
          id TEXT PRIMARY KEY,
          user_hash TEXT NOT NULL,
          query_length INTEGER NOT NULL,
          intent TEXT NOT NULL,
          retrieved_titles TEXT NOT NULL DEFAULT '[]',
          latency_ms INTEGER NOT NULL DEFAULT 0,
          safety_triggered INTEGER NOT NULL DEFAULT 0,
          response_length INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL
        );
      `)
    },
  },
  {
    version: 2,
    description: 'Interaction log lookup indexes',
    up(db) {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_interaction_log_created ON interaction_log(created_at);
        CREATE INDEX IF NOT EXISTS idx_interaction_log_intent ON interaction_log(intent);
      `)
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version

export function runMigrations(db: Database.Database): void {
  db.exec(
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const applied = getSchemaVersion(db)

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined
  return row?.version ?? 0
}
