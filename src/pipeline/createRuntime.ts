/**
 * Runtime assembly
 *
 * Wires config, stores, emotional state, stages, supervisor and the
 * consolidation worker into one object with the operations callers use.
 *
 * @example
 * ```ts
 * const runtime = await loadRuntime()
 * runtime.start()
 * const { reply } = await runtime.respond('I just got back from a jazz concert')
 * await runtime.shutdown()
 * ```
 */

import { createLogger } from '../shared/logger.js'
import { RuntimeEventBus } from '../shared/events/runtimeEvents.js'
import { getDataDir, resolveDataPaths } from '../store/paths.js'
import { loadConfig, getDefaultConfig } from '../config/loadConfig.js'
import type { Config } from '../config/schema.js'
import { createOpenAICompletionService } from '../backend/openaiCompletionService.js'
import type { TextCompletionService } from '../backend/types.js'
import { EmotionalState } from '../emotion/emotionalState.js'
import type { EmotionSnapshot } from '../emotion/types.js'
import {
  ShortTermStore,
  createFilePersistence,
  type ShortTermPersistence,
} from '../memory/shortTermStore.js'
import { FileLongTermStore, type LongTermStoreAdapter } from '../memory/longTermStore.js'
import { ConsolidationWorker, type ConsolidationStatus } from '../memory/consolidationWorker.js'
import { PersonalityNotesStore } from '../memory/personalityNotes.js'
import type {
  Clock,
  ConsolidationRecord,
  MemoryCategory,
  MemoryEntry,
  PersonalityNotes,
} from '../memory/types.js'
import { createDefaultStages } from '../stages/index.js'
import type { BackgroundStages, ForegroundStages } from '../stages/types.js'
import { BackgroundSupervisor, type SupervisorInfo } from './backgroundSupervisor.js'
import { CognitivePipeline } from './cognitivePipeline.js'
import type { PipelineResponse, RespondOptions } from './types.js'

const logger = createLogger('runtime')

export interface RuntimeOptions {
  config?: Config
  /** Overrides config.dataDir and COGRT_DATA_DIR */
  dataDir?: string
  completion?: TextCompletionService
  longTerm?: LongTermStoreAdapter
  shortTermPersistence?: ShortTermPersistence
  /** Replace individual stages, mostly for tests */
  stages?: {
    foreground?: Partial<ForegroundStages>
    background?: Partial<BackgroundStages>
  }
  clock?: Clock
}

export interface RuntimeStatus {
  requestsProcessed: number
  background: SupervisorInfo
  shortTermEntries: number
  consolidation: ConsolidationStatus
  emotions: EmotionSnapshot
}

export interface CognitiveRuntime {
  readonly events: RuntimeEventBus
  respond(input: string, options?: RespondOptions): Promise<PipelineResponse>
  /** Resolves null when a cycle was already running */
  triggerConsolidation(): Promise<ConsolidationRecord | null>
  getEmotionalSnapshot(): EmotionSnapshot
  getActiveShortTerm(category?: MemoryCategory): MemoryEntry[]
  getPersonalityNotes(): PersonalityNotes
  getConsolidationHistory(limit?: number): ConsolidationRecord[]
  getStatus(): RuntimeStatus
  /** Schedule the consolidation interval check */
  start(): void
  /** Resolves once queued background work has finished */
  drainBackground(): Promise<void>
  shutdown(): Promise<void>
}

export function createRuntime(options: RuntimeOptions = {}): CognitiveRuntime {
  const config = options.config ?? getDefaultConfig()
  const clock = options.clock ?? Date.now
  const paths = resolveDataPaths(options.dataDir ?? config.dataDir ?? getDataDir())
  const events = new RuntimeEventBus()

  const shortTerm = new ShortTermStore({
    persistence: options.shortTermPersistence ?? createFilePersistence(paths.shortTermDir),
    decay: config.decay,
    thresholds: config.shortTerm,
    clock,
  })
  const longTerm = options.longTerm ?? new FileLongTermStore(paths.longTermDir)
  const emotions = new EmotionalState({ initial: config.emotions.initial, filePath: paths.emotions })
  const personality = new PersonalityNotesStore(paths.personality, clock)
  const supervisor = new BackgroundSupervisor({ capacity: config.pipeline.backgroundQueueCapacity })

  const consolidation = new ConsolidationWorker({
    shortTerm,
    longTerm,
    settings: config.consolidation,
    logPath: paths.consolidationLog,
    statePath: paths.consolidationState,
    clock,
    events,
    dispatch: (label, run) => supervisor.submit(label, run),
  })

  const completion = options.completion ?? createOpenAICompletionService(config.provider)
  const defaults = createDefaultStages({
    completion,
    maxTokens: config.provider.maxTokens,
    retryBackoffMs: config.pipeline.retryBackoffMs,
    deltaScale: config.emotions.deltaScale,
    shortTerm,
    longTerm,
    shortTermLimit: config.pipeline.recallShortTermLimit,
    longTermTopK: config.pipeline.longTermTopK,
    reinforceSimilarity: config.pipeline.reinforceSimilarity,
  })

  const pipeline = new CognitivePipeline({
    stages: {
      foreground: { ...defaults.foreground, ...options.stages?.foreground },
      background: { ...defaults.background, ...options.stages?.background },
    },
    shortTerm,
    emotions,
    personality,
    supervisor,
    events,
    settings: config.pipeline,
    consolidation,
    clock,
  })

  logger.debug(`Runtime ready (data: ${paths.root}, completion: ${completion.name})`)

  return {
    events,

    respond: (input, respondOptions) => pipeline.respond(input, respondOptions),

    triggerConsolidation: () => consolidation.trigger('manual'),

    getEmotionalSnapshot: () => emotions.snapshot(),

    getActiveShortTerm: category => shortTerm.listActive(category ? { category } : {}),

    getPersonalityNotes: () => personality.getNotes(),

    getConsolidationHistory: limit => consolidation.getHistory(limit),

    getStatus: () => ({
      requestsProcessed: pipeline.processedCount,
      background: supervisor.info(),
      shortTermEntries: shortTerm.size(),
      consolidation: consolidation.getStatus(),
      emotions: emotions.snapshot(),
    }),

    start: () => consolidation.start(),

    drainBackground: () => supervisor.drain(),

    async shutdown() {
      consolidation.stop()
      await supervisor.stop()
      logger.debug('Runtime stopped')
    },
  }
}

/** Load config from the yaml files and env, then build the runtime */
export async function loadRuntime(
  options: Omit<RuntimeOptions, 'config'> & { cwd?: string } = {}
): Promise<CognitiveRuntime> {
  const { cwd, ...rest } = options
  const config = await loadConfig({ cwd })
  return createRuntime({ ...rest, config })
}
