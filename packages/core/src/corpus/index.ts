/**
 * The fixed knowledge entries available for retrieval.
 */

export { CATEGORIES, CategorySchema, CorpusEntrySchema, CorpusSchema } from './schemas.js'
export type { Category, CorpusEntry, CorpusStats } from './schemas.js'
export { parseCorpus, loadCorpusFile } from './loader.js'
export { getCorpusStats } from './stats.js'
