/**
 * Cognitive pipeline — per-request orchestration
 *
 * Classifier alone, then Affect ∥ Recall joined under a bounded timeout, then
 * Synthesis. Foreground side effects (emotion deltas, memory writes and
 * reinforcements) are applied before the call returns. Reward, Archivist and
 * ToolDecider run afterwards on the background supervisor against a frozen
 * copy of the context.
 *
 * The caller always gets a reply: a stage failure only marks the response
 * as degraded.
 */

import { generateRequestId } from '../shared/generateId.js'
import { assertNever, type AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import { createSlotPool, deepFreeze } from '../shared/concurrency.js'
import { createLogger, logError } from '../shared/logger.js'
import type { RuntimeEventBus } from '../shared/events/runtimeEvents.js'
import type { EmotionalState, DeltaBatch } from '../emotion/emotionalState.js'
import type { ShortTermStore } from '../memory/shortTermStore.js'
import type { PersonalityNotesStore } from '../memory/personalityNotes.js'
import type { ConsolidationWorker } from '../memory/consolidationWorker.js'
import type { Clock, MemoryWriteRequest, PersonalitySection } from '../memory/types.js'
import type { PipelineConfig } from '../config/schema.js'
import { fallbackClassification } from '../stages/classifierStage.js'
import type { ToolCommand } from '../stages/toolCommands.js'
import {
  emptyResult,
  type BackgroundStageName,
  type BackgroundStages,
  type ForegroundStages,
  type StageName,
  type StageResult,
} from '../stages/types.js'
import { runWithDeadline } from './runWithDeadline.js'
import { RequestStateMachine } from './requestStateMachine.js'
import type { BackgroundSupervisor } from './backgroundSupervisor.js'
import type {
  BackgroundContext,
  HistoryTurn,
  PipelineContext,
  PipelineResponse,
  RespondOptions,
} from './types.js'

const logger = createLogger('pipeline')

export const DEGRADED_REPLY =
  "Sorry, I couldn't put a proper answer together just now. Could you say that again in a moment?"

export type PipelineSettings = Pick<
  PipelineConfig,
  | 'stageTimeoutMs'
  | 'parallelJoinTimeoutMs'
  | 'parallelPoolSize'
  | 'historyWindow'
  | 'highImportanceBoost'
  | 'defaultLocale'
>

export interface PipelineDeps {
  stages: { foreground: ForegroundStages; background: BackgroundStages }
  shortTerm: ShortTermStore
  emotions: EmotionalState
  personality: PersonalityNotesStore
  supervisor: BackgroundSupervisor
  events: RuntimeEventBus
  settings: PipelineSettings
  /** Counts finished requests toward the interaction trigger */
  consolidation?: ConsolidationWorker
  clock?: Clock
}

const NOTE_SECTION_BY_TOOL = {
  update_user_profile: 'user',
  update_soul: 'soul',
  update_preferences: 'preferences',
} as const satisfies Record<string, PersonalitySection>

type StageOutcome = { stage: StageName; result: StageResult }

/** The last `window` turns; none at all when the window is 0 */
function lastTurns(turns: readonly HistoryTurn[], window: number): HistoryTurn[] {
  return window > 0 ? turns.slice(-window) : []
}

export class CognitivePipeline {
  private history: HistoryTurn[] = []
  private processed = 0
  private readonly clock: Clock

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? Date.now
  }

  /** Requests answered so far */
  get processedCount(): number {
    return this.processed
  }

  async respond(inputText: string, options: RespondOptions = {}): Promise<PipelineResponse> {
    const { stages, settings, events } = this.deps
    const startedAt = this.clock()
    const requestId = generateRequestId()
    const log = logger.child(requestId)

    const machine = new RequestStateMachine(requestId, state => {
      events.emit('request:state', { requestId, state, at: new Date(this.clock()).toISOString() })
    })

    const context: PipelineContext = {
      requestId,
      inputText,
      locale: options.locale ?? settings.defaultLocale,
      history: lastTurns(options.history ?? this.history, settings.historyWindow),
      emotionalSnapshot: this.deps.emotions.snapshot(),
      personality: this.deps.personality.formatForPrompt(),
      stageResults: {},
    }
    const degraded: StageName[] = []
    // Successful foreground stages in completion order
    const completed: StageOutcome[] = []

    const fail = (stage: StageName, error: AppError) => {
      degraded.push(stage)
      logError(log, `Stage ${stage} degraded`, error, { requestId, stage })
    }

    // ---- CLASSIFYING ----
    const classified = await runWithDeadline('classifier', settings.stageTimeoutMs.classifier, signal =>
      stages.foreground.classifier.run(context, signal)
    )
    if (classified.ok) {
      context.stageResults.classifier = classified.value
      completed.push({ stage: 'classifier', result: classified.value })
    } else {
      fail('classifier', classified.error)
      context.stageResults.classifier = emptyResult(fallbackClassification(context))
    }

    // ---- PARALLEL_ANALYSIS ----
    machine.transition('PARALLEL_ANALYSIS')
    const pool = createSlotPool(settings.parallelPoolSize)
    const join = new AbortController()
    const joinTimer = setTimeout(() => join.abort(), settings.parallelJoinTimeoutMs)
    const parallelTimeout = (stageMs: number) => Math.min(stageMs, settings.parallelJoinTimeoutMs)

    const runParallel = <T extends StageResult>(
      stage: 'affect' | 'recall',
      run: (signal: AbortSignal) => Promise<Result<T, AppError>>
    ): Promise<Result<T, AppError>> =>
      pool.run(() => runWithDeadline(stage, parallelTimeout(settings.stageTimeoutMs[stage]), run, join.signal))

    try {
      await Promise.all([
        runParallel('affect', signal => stages.foreground.affect.run(context, signal)).then(result => {
          if (!result.ok) return fail('affect', result.error)
          context.stageResults.affect = result.value
          completed.push({ stage: 'affect', result: result.value })
        }),
        runParallel('recall', signal => stages.foreground.recall.run(context, signal)).then(result => {
          if (!result.ok) return fail('recall', result.error)
          context.stageResults.recall = result.value
          completed.push({ stage: 'recall', result: result.value })
        }),
      ])
    } finally {
      clearTimeout(joinTimer)
    }

    // ---- SYNTHESIZING ----
    machine.transition('SYNTHESIZING')
    const synthesized = await runWithDeadline('synthesis', settings.stageTimeoutMs.synthesis, signal =>
      stages.foreground.synthesis.run(context, signal)
    )
    let reply = DEGRADED_REPLY
    if (synthesized.ok) {
      context.stageResults.synthesis = synthesized.value
      completed.push({ stage: 'synthesis', result: synthesized.value })
      reply = synthesized.value.payload.reply
    } else {
      fail('synthesis', synthesized.error)
    }

    const batch = this.deps.emotions.createBatch(requestId)
    this.proposeAll(batch, completed)
    const emotions = await this.deps.emotions.applyQueued(batch)
    await this.applyMemoryEffects(completed, requestId)

    // ---- RESPONDED ----
    machine.transition('RESPONDED')
    this.processed++
    if (!options.history) {
      this.history = lastTurns(
        [...this.history, { user: inputText, assistant: reply }],
        settings.historyWindow
      )
    }

    const classification = context.stageResults.classifier?.payload ?? fallbackClassification(context)
    const response: PipelineResponse = {
      requestId,
      status: degraded.length > 0 ? 'degraded' : 'ok',
      reply,
      strategy: context.stageResults.synthesis?.payload.strategy ?? null,
      classification,
      emotions,
      degradedStages: degraded,
      states: [],
      durationMs: Math.max(0, this.clock() - startedAt),
    }

    // ---- BACKGROUND_PROCESSING ----
    machine.transition('BACKGROUND_PROCESSING')
    response.states = machine.history()
    this.dispatchBackground(this.freezeForBackground(context, reply), machine, startedAt)

    log.info(
      `Responded (${response.status}${degraded.length ? `: ${degraded.join(', ')}` : ''}) in ${response.durationMs}ms`
    )
    return response
  }

  private freezeForBackground(context: PipelineContext, reply: string): BackgroundContext {
    return deepFreeze(structuredClone({ ...context, reply }))
  }

  private proposeAll(batch: DeltaBatch, outcomes: readonly StageOutcome[]): void {
    for (const { stage, result } of outcomes) {
      for (const { dimension, delta, reason } of result.emotionDeltas) {
        batch.propose(dimension, delta, reason, stage)
      }
    }
  }

  /**
   * Writes and reinforcements requested by stages. Recall writes are raised
   * from normal to high importance when Affect's boost is high enough.
   */
  private async applyMemoryEffects(outcomes: readonly StageOutcome[], requestId: string): Promise<void> {
    const { shortTerm, settings } = this.deps
    const affect = outcomes.find(o => o.stage === 'affect')?.result.payload
    const boosted = affect?.kind === 'affect' && affect.memoryBoost >= settings.highImportanceBoost

    for (const { stage, result } of outcomes) {
      for (const write of result.memoryWrites) {
        const request: MemoryWriteRequest =
          boosted && stage === 'recall' && write.importance === 'normal' ? { ...write, importance: 'high' } : write
        await this.writeMemory(request, stage, requestId)
      }
      for (const id of result.reinforcements) {
        const reinforced = await shortTerm.reinforce(id)
        if (!reinforced.ok) {
          logger.debug(`Reinforce skipped for ${id}: ${reinforced.error.message}`)
        }
      }
    }
  }

  private async writeMemory(write: MemoryWriteRequest, stage: StageName, requestId: string): Promise<void> {
    const added = await this.deps.shortTerm.add(write.content, write.category, write.importance)
    if (!added.ok) {
      logError(logger, 'Memory write dropped', added.error, { requestId, stage })
    }
  }

  private dispatchBackground(context: BackgroundContext, machine: RequestStateMachine, startedAt: number): void {
    const submitted = this.deps.supervisor.submit(`background:${context.requestId}`, () =>
      this.runBackground(context, machine, startedAt)
    )
    if (!submitted.ok) {
      logger.warn(`Background work skipped for ${context.requestId}: ${submitted.error.message}`)
      this.finish(machine, ['reward', 'archivist', 'toolDecider'], startedAt)
    }
  }

  private async runBackground(
    context: BackgroundContext,
    machine: RequestStateMachine,
    startedAt: number
  ): Promise<void> {
    const { stages, settings } = this.deps
    const timeouts = settings.stageTimeoutMs
    const failed: BackgroundStageName[] = []
    const completed: StageOutcome[] = []

    const [reward, archivist, toolDecider] = await Promise.all([
      runWithDeadline('reward', timeouts.reward, signal => stages.background.reward.run(context, signal)),
      runWithDeadline('archivist', timeouts.archivist, signal => stages.background.archivist.run(context, signal)),
      runWithDeadline('toolDecider', timeouts.toolDecider, signal =>
        stages.background.toolDecider.run(context, signal)
      ),
    ])

    const settle = (stage: BackgroundStageName, result: Result<StageResult, AppError>): boolean => {
      if (result.ok) {
        completed.push({ stage, result: result.value })
        return true
      }
      failed.push(stage)
      logError(logger, `Background stage ${stage} failed`, result.error, {
        requestId: context.requestId,
        stage,
      })
      return false
    }

    settle('reward', reward)
    if (settle('archivist', archivist) && archivist.ok) {
      for (const note of archivist.value.payload.notes) {
        await this.addNote(note.section, note.key, note.value, 'archivist')
      }
    }
    if (settle('toolDecider', toolDecider) && toolDecider.ok) {
      for (const command of toolDecider.value.payload.commands) {
        await this.applyToolCommand(command, context.requestId)
      }
    }

    const batch = this.deps.emotions.createBatch(`${context.requestId}:background`)
    this.proposeAll(batch, completed)
    await this.deps.emotions.applyQueued(batch)
    await this.applyMemoryEffects(completed, context.requestId)

    try {
      await this.deps.consolidation?.recordInteraction()
    } catch (error) {
      logError(logger, 'Interaction-triggered consolidation failed', error, { requestId: context.requestId })
    }

    this.finish(machine, failed, startedAt)
  }

  private finish(machine: RequestStateMachine, failedStages: string[], startedAt: number): void {
    machine.transition('DONE')
    this.deps.events.emit('request:done', {
      requestId: machine.requestId,
      failedStages,
      durationMs: Math.max(0, this.clock() - startedAt),
    })
  }

  private async addNote(section: PersonalitySection, key: string, value: string, source: string): Promise<void> {
    const added = await this.deps.personality.addNote({ section, key, value, source })
    if (!added.ok) {
      logError(logger, 'Personality note dropped', added.error, { section, key })
    }
  }

  private async applyToolCommand(command: ToolCommand, requestId: string): Promise<void> {
    switch (command.tool) {
      case 'update_user_profile':
      case 'update_soul':
      case 'update_preferences': {
        const section = NOTE_SECTION_BY_TOOL[command.tool]
        for (const [key, value] of Object.entries(command.data)) {
          await this.addNote(section, key, value, `tool:${command.tool}`)
        }
        return
      }
      case 'add_short_term_memory':
        await this.writeMemory(command, 'toolDecider', requestId)
        return
      default:
        assertNever(command)
    }
  }
}
