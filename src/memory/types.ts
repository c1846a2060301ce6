/**
 * Tiered memory types
 */

export const MEMORY_CATEGORIES = ['user', 'system', 'context', 'chat', 'dream'] as const
export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number]

export const MEMORY_IMPORTANCE = ['low', 'normal', 'high'] as const
export type MemoryImportance = (typeof MEMORY_IMPORTANCE)[number]

/** Epoch milliseconds source; injected so decay can be tested without waiting */
export type Clock = () => number

export interface MemoryEntry {
  id: string
  content: string
  category: MemoryCategory
  importance: MemoryImportance
  createdAt: string
  lastReinforcedAt: string
  reinforcementCount: number
  /** 0-1, recomputed from age + reinforcementCount; 1.0 only at creation */
  strength: number
}

/** A stage's request to store a new fact */
export interface MemoryWriteRequest {
  content: string
  category: MemoryCategory
  importance: MemoryImportance
}

export interface RankedMemory {
  entry: MemoryEntry
  /** 0-1 similarity to the query */
  relevance: number
}

export interface SweepCandidate {
  entry: MemoryEntry
  /** Strength recomputed at sweep time */
  strength: number
}

export interface SweepDecision {
  promote: SweepCandidate[]
  evict: SweepCandidate[]
  /** Entries that stay in the short-term tier; their strength gets refreshed */
  retain: SweepCandidate[]
  scannedAt: string
}

export type ConsolidationTrigger = 'interval' | 'interactions' | 'manual'

export interface ConsolidationRecord {
  timestamp: string
  trigger: ConsolidationTrigger
  entriesScanned: number
  entriesPromoted: number
  entriesEvicted: number
  /** Promotion candidates left in short-term after a WriteFailed */
  promotionsDeferred: number
  durationMs: number
}

export const PERSONALITY_SECTIONS = ['soul', 'user', 'preferences'] as const
export type PersonalitySection = (typeof PERSONALITY_SECTIONS)[number]

export interface PersonalityNote {
  key: string
  value: string
  /** Stage or command that wrote the note */
  source: string
  at: string
}

export type PersonalityNotes = Record<PersonalitySection, PersonalityNote[]>
