import { z } from 'zod'
import { NODE_TYPES, SECTIONS } from './types'

export const nodeTypeSchema = z.enum(NODE_TYPES)

export const cueDefinitionSchema = z.object({
  id: z.string().min(1),
  type: nodeTypeSchema,
  pattern: z.string().min(1),
  weight: z.number().positive()
})

export type CueDefinition = z.infer<typeof cueDefinitionSchema>

export const patternEntrySchema = z.object({
  pattern: z.string().min(1),
  type: nodeTypeSchema,
  run_id: z.string(),
  timestamp: z.string()
})

// Versioned file, or the bare record list older stores were written as
export const patternStoreFileSchema = z.union([
  z.object({ version: z.literal(1), entries: z.array(patternEntrySchema) }),
  z.array(patternEntrySchema).transform((entries) => ({ version: 1 as const, entries }))
])

export const textSpanSchema = z.object({
  text: z.string(),
  section: z.string().optional()
})

export const documentInputSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  spans: z.array(textSpanSchema)
})

export const sectionSchema = z.enum(SECTIONS)
