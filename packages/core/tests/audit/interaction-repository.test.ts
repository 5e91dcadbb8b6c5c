import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/database.js'
import { InteractionLogRepository } from '../../src/audit/interaction-repository.js'
import { SqliteInteractionSink } from '../../src/audit/sink.js'
import { hashSessionId } from '../../src/audit/session-hash.js'

describe('hashSessionId', () => {
  it('returns 16 stable hex characters', () => {
    const hash = hashSessionId('session-1')
    expect(hash).toMatch(/^[0-9a-f]{16}$/)
    expect(hashSessionId('session-1')).toBe(hash)
    expect(hashSessionId('session-2')).not.toBe(hash)
  })

  it('matches the SHA-256 prefix', () => {
    // sha256("abc") = ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad
    expect(hashSessionId('abc')).toBe('ba7816bf8f01cfea')
  })
})

describe('InteractionLogRepository', () => {
  let db: Database.Database
  let repo: InteractionLogRepository
  const userHash = hashSessionId('session-1')

  beforeEach(() => {
    db = openDatabase(':memory:')
    repo = new InteractionLogRepository(db)
  })

  afterEach(() => {
    db.close()
  })

  it('logs an entry with defaults applied', () => {
    const result = repo.log({ userHash, queryLength: 24, intent: 'course', latencyMs: 812.6 })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({
      userHash,
      queryLength: 24,
      intent: 'course',
      retrievedTitles: [],
      latencyMs: 813,
      safetyTriggered: false,
      responseLength: 0,
    })
    expect(result.value.id).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('rejects an invalid user hash', () => {
    const result = repo.log({ userHash: 'raw-session-id', queryLength: 5, intent: 'general' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  it('lists recent entries newest first and round-trips titles', () => {
    repo.log({ userHash, queryLength: 10, intent: 'course', retrievedTitles: ['Enrolling', 'Course forums'] })
    repo.log({ userHash, queryLength: 20, intent: 'blocked', safetyTriggered: true })

    const result = repo.listRecent()
    if (!result.ok) throw result.error
    expect(result.value.map((e) => e.intent)).toEqual(['blocked', 'course'])
    expect(result.value[0].safetyTriggered).toBe(true)
    expect(result.value[1].retrievedTitles).toEqual(['Enrolling', 'Course forums'])
  })

  it('limits and filters by intent', () => {
    repo.log({ userHash, queryLength: 1, intent: 'course' })
    repo.log({ userHash, queryLength: 2, intent: 'progress' })
    repo.log({ userHash, queryLength: 3, intent: 'course' })

    const recent = repo.listRecent(1)
    if (!recent.ok) throw recent.error
    expect(recent.value.map((e) => e.queryLength)).toEqual([3])

    const courses = repo.listByIntent('course')
    if (!courses.ok) throw courses.error
    expect(courses.value.map((e) => e.queryLength)).toEqual([3, 1])
  })

  it('summarizes counts per intent', () => {
    repo.log({ userHash, queryLength: 1, intent: 'course' })
    repo.log({ userHash, queryLength: 2, intent: 'course' })
    repo.log({ userHash, queryLength: 3, intent: 'blocked', safetyTriggered: true })

    expect(repo.summarize()).toEqual({
      ok: true,
      value: { total: 3, safetyTriggered: 1, byIntent: { blocked: 1, course: 2 } },
    })
  })

  it('returns a database error once the connection is closed', () => {
    db.close()
    const result = repo.listRecent()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('DB_ERROR')
    db = openDatabase(':memory:')
  })

  it('rejects a stored row that fails the entry schema', () => {
    repo.log({ userHash, queryLength: 1, intent: 'course' })
    db.prepare(
      'INSERT INTO interaction_log (id, user_hash, query_length, intent, retrieved_titles, created_at) VALUES (?, ?, ?, ?, ?, ?)',
    ).run('00000000-0000-4000-8000-000000000000', userHash, 5, 'billing', '[]', '2030-01-01T00:00:00.000Z')

    const result = repo.listRecent()
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('DB_ERROR')
      expect(result.error.message).toMatch(/^Invalid interaction row 00000000-0000-4000-8000-000000000000: intent /)
    }
  })

  it('rejects a stored row whose titles are not JSON', () => {
    db.prepare(
      'INSERT INTO interaction_log (id, user_hash, query_length, intent, retrieved_titles, created_at) VALUES (?, ?, ?, ?, ?, ?)',
    ).run('00000000-0000-4000-8000-000000000001', userHash, 5, 'course', 'not json', '2030-01-01T00:00:00.000Z')

    const result = repo.listByIntent('course')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('DB_ERROR')
  })
})

describe('SqliteInteractionSink', () => {
  it('writes valid entries and drops invalid ones with a warning', () => {
    const db = openDatabase(':memory:')
    const repo = new InteractionLogRepository(db)
    const sink = new SqliteInteractionSink(repo)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    sink.record({ userHash: hashSessionId('s'), queryLength: 4, intent: 'general' })
    expect(() => sink.record({ userHash: 'nope', queryLength: 4, intent: 'general' })).not.toThrow()

    const recent = repo.listRecent()
    if (!recent.ok) throw recent.error
    expect(recent.value).toHaveLength(1)
    expect(warn).toHaveBeenCalledTimes(1)
    db.close()
  })
})
