/**
 * Pipeline request types
 */

import type { EmotionSnapshot } from '../emotion/types.js'
import type { ClassifierPayload, ResponseStrategy, StageName, StageResultMap } from '../stages/types.js'

export const PIPELINE_STATES = [
  'CLASSIFYING',
  'PARALLEL_ANALYSIS',
  'SYNTHESIZING',
  'RESPONDED',
  'BACKGROUND_PROCESSING',
  'DONE',
] as const

export type PipelineState = (typeof PIPELINE_STATES)[number]

export interface HistoryTurn {
  user: string
  assistant: string
}

/**
 * Per-request context. Everything is read-only except `stageResults`,
 * which the orchestrator fills as stages finish. Never persisted.
 */
export interface PipelineContext {
  readonly requestId: string
  readonly inputText: string
  readonly locale: string
  readonly history: readonly HistoryTurn[]
  /** Emotional state at request start */
  readonly emotionalSnapshot: EmotionSnapshot
  /** Personality notes as prompt lines */
  readonly personality: string
  readonly stageResults: StageResultMap
}

/** Frozen copy handed to background stages, with the reply that was sent */
export interface BackgroundContext extends Omit<PipelineContext, 'stageResults'> {
  readonly stageResults: Readonly<StageResultMap>
  readonly reply: string
}

export interface RespondOptions {
  locale?: string
  /** Overrides the runtime's own rolling history for this request */
  history?: HistoryTurn[]
}

export interface PipelineResponse {
  requestId: string
  /** 'degraded' when any foreground stage failed or timed out */
  status: 'ok' | 'degraded'
  reply: string
  strategy: ResponseStrategy | null
  classification: ClassifierPayload
  /** Emotional state after this request's foreground deltas */
  emotions: EmotionSnapshot
  degradedStages: StageName[]
  /** States passed through before the call returned */
  states: PipelineState[]
  durationMs: number
}
