/**
 * Reads the static knowledge corpus once at startup.
 * Any schema violation is a load error; no partial corpus is ever returned.
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err, TutorDeskError, errorMessage, fromPromise } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CorpusSchema } from './schemas.js'
import type { CorpusEntry } from './schemas.js'

/** Validate an already-parsed corpus value (e.g. the contents of a JSON file). */
export function parseCorpus(raw: unknown): Result<CorpusEntry[], TutorDeskError> {
  const parsed = CorpusSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    return Err(TutorDeskError.load(`Invalid corpus${where}: ${issue?.message ?? parsed.error.message}`))
  }

  const seen = new Set<string>()
  for (const entry of parsed.data) {
    if (seen.has(entry.id)) {
      return Err(TutorDeskError.load(`Duplicate corpus entry id: ${entry.id}`))
    }
    seen.add(entry.id)
  }

  return Ok(parsed.data.map((entry) => Object.freeze({ ...entry, tags: [...entry.tags] })))
}

export async function loadCorpusFile(path: string): Promise<Result<CorpusEntry[], TutorDeskError>> {
  const text = await fromPromise(readFile(path, 'utf-8'), (err) =>
    TutorDeskError.load(`Cannot read corpus file ${path}: ${errorMessage(err)}`),
  )
  if (!text.ok) return text

  let raw: unknown
  try {
    raw = JSON.parse(text.value)
  } catch (err) {
    return Err(TutorDeskError.load(`Corpus file ${path} is not valid JSON: ${errorMessage(err)}`))
  }

  const result = parseCorpus(raw)
  if (result.ok) {
    console.log(`[corpus] loaded ${result.value.length} entries from ${path}`)
  }
  return result
}
