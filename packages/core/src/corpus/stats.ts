import type { CorpusEntry, CorpusStats } from './schemas.js'

/** Total size and per-category counts, for display. */
export function getCorpusStats(entries: readonly CorpusEntry[]): CorpusStats {
  const byCategory: CorpusStats['byCategory'] = {}
  for (const entry of entries) {
    byCategory[entry.category] = (byCategory[entry.category] ?? 0) + 1
  }
  return { totalEntries: entries.length, byCategory }
}
