/**
 * Zod schemas and types for the knowledge corpus.
 */

import { z } from 'zod'

export const CATEGORIES = ['course', 'assessment', 'certification', 'progress'] as const

export const CategorySchema = z.enum(CATEGORIES)
export type Category = z.infer<typeof CategorySchema>

export const CorpusEntrySchema = z.object({
  id: z.string().min(1, 'Entry id cannot be empty'),
  title: z.string().min(1, 'Entry title cannot be empty'),
  category: CategorySchema,
  content: z.string().min(1, 'Entry content cannot be empty'),
  tags: z.array(z.string()).default([]),
})

export type CorpusEntry = Readonly<z.infer<typeof CorpusEntrySchema>>

export const CorpusSchema = z
  .array(CorpusEntrySchema)
  .min(1, 'Corpus must contain at least one entry')

export interface CorpusStats {
  totalEntries: number
  /** Entry count per category, keyed in first-seen corpus order. */
  byCategory: Partial<Record<Category, number>>
}
