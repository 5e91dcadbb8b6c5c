/**
 * Zod schemas for the interaction log.
 */

import { z } from 'zod'

export const InteractionIntentSchema = z.enum([
  'course',
  'assessment',
  'certification',
  'progress',
  'general',
  'blocked',
])
export type InteractionIntent = z.infer<typeof InteractionIntentSchema>

export const CreateInteractionInputSchema = z.object({
  userHash: z.string().regex(/^[0-9a-f]{16}$/, 'userHash must be 16 hex characters'),
  queryLength: z.number().int().nonnegative(),
  intent: InteractionIntentSchema,
  retrievedTitles: z.array(z.string()).default([]),
  latencyMs: z.number().nonnegative().default(0),
  safetyTriggered: z.boolean().default(false),
  responseLength: z.number().int().nonnegative().default(0),
})

export type CreateInteractionInput = z.input<typeof CreateInteractionInputSchema>

export const InteractionEntrySchema = z.object({
  id: z.string().uuid(),
  userHash: z.string(),
  queryLength: z.number().int(),
  intent: InteractionIntentSchema,
  retrievedTitles: z.array(z.string()),
  latencyMs: z.number().int(),
  safetyTriggered: z.boolean(),
  responseLength: z.number().int(),
  createdAt: z.string().datetime(),
})

export type InteractionEntry = z.infer<typeof InteractionEntrySchema>

export interface InteractionSummary {
  total: number
  safetyTriggered: number
  byIntent: Partial<Record<InteractionIntent, number>>
}
