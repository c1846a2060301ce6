/**
 * Consolidation ("sleep") worker
 *
 * IDLE → SWEEPING → APPLYING → IDLE
 *
 * Triggered by elapsed time (cron check), by the interaction counter, or
 * manually. A trigger while a cycle runs is ignored, not queued. Promotions
 * are attempted before any eviction of the same sweep; a promotion whose
 * long-term write fails stays in the short-term tier for the next cycle.
 * Interactions counted while a cycle runs carry over to the next one.
 */

import cron from 'node-cron'
import { createLogger, logError } from '../shared/logger.js'
import { appendJsonLine, readJson, readJsonLines, writeJson } from '../store/readWriteJson.js'
import {
  isConsolidationRecord,
  isConsolidationState,
  type ConsolidationState,
} from '../store/schemas.js'
import type { RuntimeEventBus } from '../shared/events/runtimeEvents.js'
import type { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import type { ShortTermStore } from './shortTermStore.js'
import type { LongTermStoreAdapter } from './longTermStore.js'
import type { Clock, ConsolidationRecord, ConsolidationTrigger } from './types.js'

const logger = createLogger('consolidation')

export type ConsolidationPhase = 'IDLE' | 'SWEEPING' | 'APPLYING'

export interface ConsolidationSettings {
  enabled: boolean
  intervalHours: number
  interactionThreshold: number
  checkCron: string
}

export interface ConsolidationWorkerOptions {
  shortTerm: ShortTermStore
  longTerm: LongTermStoreAdapter
  settings: ConsolidationSettings
  /** JSON Lines file of ConsolidationRecords */
  logPath: string
  statePath: string
  clock?: Clock
  events?: RuntimeEventBus
  /** Hands the cron-fired check to a scheduler; runs it inline when absent */
  dispatch?: (label: string, run: () => Promise<void>) => Result<void, AppError>
}

export interface ConsolidationStatus extends ConsolidationState {
  phase: ConsolidationPhase
  scheduled: boolean
  /** "now", "disabled", or what is left before the next automatic cycle */
  nextTrigger: string
}

const EMPTY_STATE: ConsolidationState = {
  lastCycleAt: null,
  interactionsSinceCycle: 0,
  totalCycles: 0,
}

export class ConsolidationWorker {
  private phase: ConsolidationPhase = 'IDLE'
  private state: ConsolidationState
  private task: cron.ScheduledTask | null = null
  private readonly clock: Clock
  /** Interval baseline before the first completed cycle */
  private readonly startedAt: number

  constructor(private readonly options: ConsolidationWorkerOptions) {
    this.clock = options.clock ?? Date.now
    this.startedAt = this.clock()
    this.state = readJson(options.statePath, isConsolidationState) ?? { ...EMPTY_STATE }
  }

  getPhase(): ConsolidationPhase {
    return this.phase
  }

  /**
   * Run one cycle. Resolves null without doing anything when a cycle is
   * already in progress.
   */
  async trigger(trigger: ConsolidationTrigger = 'manual'): Promise<ConsolidationRecord | null> {
    if (this.phase !== 'IDLE') {
      logger.debug(`Ignoring ${trigger} trigger while ${this.phase}`)
      return null
    }

    const { shortTerm, longTerm } = this.options
    const startedMs = this.clock()
    const countedAtStart = this.state.interactionsSinceCycle
    this.phase = 'SWEEPING'

    try {
      const decision = shortTerm.sweep()
      this.phase = 'APPLYING'

      const cleared = await shortTerm.retryPendingRemovals()
      if (cleared > 0) logger.debug(`Removed ${cleared} leftover promoted entries`)

      let promoted = 0
      let deferred = 0
      for (const { entry } of decision.promote) {
        const result = await shortTerm.promote(entry.id, e => longTerm.put(e))
        if (result.ok) {
          promoted++
        } else if (result.error.code !== 'NOT_FOUND') {
          deferred++
          logger.warn(`Promotion deferred for ${entry.id}: ${result.error.message}`)
        }
      }

      let evicted = 0
      for (const { entry } of decision.evict) {
        const result = await shortTerm.evict(entry.id)
        if (result.ok) {
          if (result.value) evicted++
        } else if (result.error.code !== 'NOT_FOUND') {
          logger.warn(`Eviction failed for ${entry.id}: ${result.error.message}`)
        }
      }

      for (const { entry } of decision.retain) {
        const result = await shortTerm.refreshStrength(entry.id)
        if (!result.ok && result.error.code !== 'NOT_FOUND') {
          logger.warn(`Strength refresh failed for ${entry.id}: ${result.error.message}`)
        }
      }

      const finishedMs = this.clock()
      const record: ConsolidationRecord = {
        timestamp: new Date(finishedMs).toISOString(),
        trigger,
        entriesScanned: decision.promote.length + decision.evict.length + decision.retain.length,
        entriesPromoted: promoted,
        entriesEvicted: evicted,
        promotionsDeferred: deferred,
        durationMs: Math.max(0, finishedMs - startedMs),
      }

      this.appendRecord(record)
      this.state = {
        lastCycleAt: record.timestamp,
        interactionsSinceCycle: Math.max(0, this.state.interactionsSinceCycle - countedAtStart),
        totalCycles: this.state.totalCycles + 1,
      }
      this.saveState()

      logger.info(
        `Cycle (${trigger}): scanned ${record.entriesScanned}, promoted ${promoted}, ` +
          `evicted ${evicted}, deferred ${deferred}`
      )
      this.options.events?.emit('consolidation:completed', record)
      return record
    } finally {
      this.phase = 'IDLE'
    }
  }

  /** Count one finished request; starts a cycle once the threshold is reached */
  async recordInteraction(): Promise<ConsolidationRecord | null> {
    this.state = { ...this.state, interactionsSinceCycle: this.state.interactionsSinceCycle + 1 }
    this.saveState()

    const { enabled, interactionThreshold } = this.options.settings
    if (!enabled || this.state.interactionsSinceCycle < interactionThreshold) return null
    return this.trigger('interactions')
  }

  /** Starts a cycle when the configured interval has elapsed */
  async checkInterval(): Promise<ConsolidationRecord | null> {
    if (!this.options.settings.enabled || this.hoursUntilInterval() > 0) return null
    return this.trigger('interval')
  }

  private hoursUntilInterval(): number {
    const since = this.state.lastCycleAt ? Date.parse(this.state.lastCycleAt) : this.startedAt
    const elapsedHours = (this.clock() - since) / 3_600_000
    return this.options.settings.intervalHours - elapsedHours
  }

  /** Schedule the interval check; no-op when disabled or already scheduled */
  start(): void {
    const { enabled, checkCron } = this.options.settings
    if (!enabled || this.task) return
    if (!cron.validate(checkCron)) {
      logger.warn(`Invalid consolidation cron expression "${checkCron}", interval trigger disabled`)
      return
    }

    const check = async () => {
      try {
        await this.checkInterval()
      } catch (error) {
        logError(logger, 'Interval consolidation failed', error)
      }
    }

    this.task = cron.schedule(checkCron, async () => {
      const { dispatch } = this.options
      if (!dispatch) return check()
      const queued = dispatch('consolidation:interval', check)
      if (!queued.ok) logger.warn(`Interval check not queued: ${queued.error.message}`)
    })
    logger.debug(`Interval check scheduled (${checkCron})`)
  }

  stop(): void {
    if (this.task) {
      this.task.stop()
      this.task = null
    }
  }

  getStatus(): ConsolidationStatus {
    return {
      ...this.state,
      phase: this.phase,
      scheduled: this.task !== null,
      nextTrigger: this.describeNextTrigger(),
    }
  }

  private describeNextTrigger(): string {
    const { enabled, interactionThreshold } = this.options.settings
    if (!enabled) return 'disabled'

    const interactionsLeft = interactionThreshold - this.state.interactionsSinceCycle
    const hoursLeft = this.hoursUntilInterval()
    if (interactionsLeft <= 0 || hoursLeft <= 0) return 'now'
    return `${interactionsLeft} interactions or ${hoursLeft.toFixed(1)} hours`
  }

  /** Completed cycles, oldest first */
  getHistory(limit?: number): ConsolidationRecord[] {
    const records = readJsonLines(this.options.logPath, isConsolidationRecord)
    if (limit === undefined) return records
    return limit > 0 ? records.slice(-limit) : []
  }

  private appendRecord(record: ConsolidationRecord): void {
    try {
      appendJsonLine(this.options.logPath, record)
    } catch (error) {
      logError(logger, 'Failed to append consolidation record', error)
    }
  }

  private saveState(): void {
    try {
      writeJson(this.options.statePath, this.state)
    } catch (error) {
      logError(logger, 'Failed to persist consolidation state', error)
    }
  }
}
