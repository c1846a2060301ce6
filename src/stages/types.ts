/**
 * Stage contract and per-role payloads
 *
 * Each stage role has its own payload shape, tagged by `kind`, so downstream
 * code reads known fields instead of an open dictionary.
 */

import type { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import type { EmotionDimension } from '../emotion/types.js'
import type {
  MemoryEntry,
  MemoryWriteRequest,
  PersonalitySection,
  RankedMemory,
} from '../memory/types.js'
import type { BackgroundContext, PipelineContext } from '../pipeline/types.js'
import type { ToolCommand } from './toolCommands.js'

export const FOREGROUND_STAGES = ['classifier', 'affect', 'recall', 'synthesis'] as const
export const BACKGROUND_STAGES = ['reward', 'archivist', 'toolDecider'] as const

export type ForegroundStageName = (typeof FOREGROUND_STAGES)[number]
export type BackgroundStageName = (typeof BACKGROUND_STAGES)[number]
export type StageName = ForegroundStageName | BackgroundStageName

// ============ Payloads ============

export const INPUT_TYPES = ['conversation', 'information', 'emotional', 'task', 'memory_query', 'urgent'] as const
export type InputType = (typeof INPUT_TYPES)[number]

export const URGENCY_LEVELS = ['low', 'medium', 'high'] as const
export type Urgency = (typeof URGENCY_LEVELS)[number]

export interface ClassifierPayload {
  kind: 'classifier'
  inputType: InputType
  language: string
  urgency: Urgency
  emotionalContent: boolean
  requiresMemorySearch: boolean
  requiresTools: boolean
  /** Input with noise removed; falls back to the raw input */
  cleanedText: string
}

export interface AffectPayload {
  kind: 'affect'
  primaryEmotion: string
  intensity: number
  sentiment: 'positive' | 'negative' | 'neutral'
  /** 1..3; scales how important new facts from this request are */
  memoryBoost: number
  tags: string[]
}

export interface RecallPayload {
  kind: 'recall'
  query: string
  shortTerm: MemoryEntry[]
  longTerm: RankedMemory[]
}

export const RESPONSE_STRATEGIES = ['conversational', 'informative', 'emotional', 'technical', 'creative'] as const
export type ResponseStrategy = (typeof RESPONSE_STRATEGIES)[number]

export interface SynthesisPayload {
  kind: 'synthesis'
  reply: string
  strategy: ResponseStrategy
  tone: string
  keyTopics: string[]
}

export interface RewardPayload {
  kind: 'reward'
  satisfaction: number
  quality: 'excellent' | 'good' | 'neutral' | 'poor' | 'bad'
  predictionError: number
}

export interface NoteUpdate {
  section: PersonalitySection
  key: string
  value: string
}

export interface ArchivistPayload {
  kind: 'archivist'
  notes: NoteUpdate[]
  rationale: string
}

export interface ToolDeciderPayload {
  kind: 'toolDecider'
  commands: ToolCommand[]
}

export interface StagePayloadMap {
  classifier: ClassifierPayload
  affect: AffectPayload
  recall: RecallPayload
  synthesis: SynthesisPayload
  reward: RewardPayload
  archivist: ArchivistPayload
  toolDecider: ToolDeciderPayload
}

export type StagePayload = StagePayloadMap[StageName]

// ============ Result ============

/** Emotion delta already scaled to the [0, 1] state range */
export interface ProposedDelta {
  dimension: EmotionDimension
  delta: number
  reason: string
}

export interface StageResult<P extends StagePayload = StagePayload> {
  payload: P
  memoryWrites: MemoryWriteRequest[]
  /** Short-term ids mentioned again by this request */
  reinforcements: string[]
  emotionDeltas: ProposedDelta[]
  /** 0..1 */
  confidence: number
}

export type StageResultMap = { [N in StageName]?: StageResult<StagePayloadMap[N]> }

// ============ Stage ============

/**
 * One unit of the pipeline. `signal` fires at the stage deadline; a stage
 * must not wait on another stage's result directly.
 */
export interface Stage<N extends StageName, C = PipelineContext> {
  readonly name: N
  run(context: C, signal: AbortSignal): Promise<Result<StageResult<StagePayloadMap[N]>, AppError>>
}

export type ForegroundStages = { [N in ForegroundStageName]: Stage<N, PipelineContext> }
/** Background stages see a frozen copy that includes the sent reply */
export type BackgroundStages = { [N in BackgroundStageName]: Stage<N, BackgroundContext> }

export function emptyResult<P extends StagePayload>(payload: P, confidence: number = 0): StageResult<P> {
  return { payload, memoryWrites: [], reinforcements: [], emotionDeltas: [], confidence }
}
