/**
 * Shapes of persisted records, checked on every read
 */

import { z } from 'zod'
import { MEMORY_CATEGORIES, MEMORY_IMPORTANCE } from '../memory/types.js'
import { EMOTION_DIMENSIONS } from '../emotion/types.js'
import type { ConsolidationRecord, MemoryEntry, PersonalityNotes } from '../memory/types.js'
import type { EmotionSnapshot } from '../emotion/types.js'

/** Turn a schema into a type guard for the read helpers */
export function guardOf<T>(schema: z.ZodType<T>): (value: unknown) => value is T {
  return (value: unknown): value is T => schema.safeParse(value).success
}

export const memoryEntrySchema: z.ZodType<MemoryEntry> = z.object({
  id: z.string().min(1),
  content: z.string(),
  category: z.enum(MEMORY_CATEGORIES),
  importance: z.enum(MEMORY_IMPORTANCE),
  createdAt: z.string(),
  lastReinforcedAt: z.string(),
  reinforcementCount: z.number().int().min(0),
  strength: z.number().min(0).max(1),
})

export const consolidationRecordSchema: z.ZodType<ConsolidationRecord> = z.object({
  timestamp: z.string(),
  trigger: z.enum(['interval', 'interactions', 'manual']),
  entriesScanned: z.number().int().min(0),
  entriesPromoted: z.number().int().min(0),
  entriesEvicted: z.number().int().min(0),
  promotionsDeferred: z.number().int().min(0),
  durationMs: z.number().min(0),
})

export interface ConsolidationState {
  lastCycleAt: string | null
  interactionsSinceCycle: number
  totalCycles: number
}

export const consolidationStateSchema: z.ZodType<ConsolidationState> = z.object({
  lastCycleAt: z.string().nullable(),
  interactionsSinceCycle: z.number().int().min(0),
  totalCycles: z.number().int().min(0),
})

const dimensionShape = Object.fromEntries(
  EMOTION_DIMENSIONS.map(dimension => [dimension, z.number().min(0).max(1)])
)

export const emotionSnapshotSchema = z.object(dimensionShape).strict()

export function isEmotionSnapshot(value: unknown): value is EmotionSnapshot {
  const parsed = emotionSnapshotSchema.safeParse(value)
  return parsed.success && EMOTION_DIMENSIONS.every(dimension => dimension in parsed.data)
}

export const isMemoryEntry = guardOf(memoryEntrySchema)
export const isConsolidationRecord = guardOf(consolidationRecordSchema)
export const isConsolidationState = guardOf(consolidationStateSchema)

const personalityNoteSchema = z.object({
  key: z.string(),
  value: z.string(),
  source: z.string(),
  at: z.string(),
})

export const personalityNotesSchema: z.ZodType<PersonalityNotes> = z.object({
  soul: z.array(personalityNoteSchema),
  user: z.array(personalityNoteSchema),
  preferences: z.array(personalityNoteSchema),
})

export const isPersonalityNotes = guardOf(personalityNotesSchema)
