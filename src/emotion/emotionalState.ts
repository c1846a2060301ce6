/**
 * Emotional state — single-writer affect vector
 *
 * Stages never touch the vector. They propose deltas into a per-request
 * DeltaBatch; the orchestrator applies a batch once, under a mutex, so at
 * most one apply runs at a time across requests. Deltas to the same
 * dimension are summed, then the result is clamped to [0, 1].
 */

import { createKeyedMutex } from '../shared/concurrency.js'
import { createLogger, logError } from '../shared/logger.js'
import { readJson, writeJson } from '../store/readWriteJson.js'
import { isEmotionSnapshot } from '../store/schemas.js'
import { EMOTION_DIMENSIONS, type EmotionDelta, type EmotionDimension, type EmotionSnapshot } from './types.js'

const logger = createLogger('emotion')

const APPLY_KEY = 'apply'

export const NEUTRAL_EMOTIONS: EmotionSnapshot = Object.freeze({
  happiness: 0.5,
  trust: 0.5,
  energy: 1,
  curiosity: 0.5,
  frustration: 0,
  motivation: 0.8,
})

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.min(1, Math.max(0, value))
}

function buildSnapshot(valueOf: (dimension: EmotionDimension) => number): EmotionSnapshot {
  return Object.freeze({
    happiness: clampUnit(valueOf('happiness')),
    trust: clampUnit(valueOf('trust')),
    energy: clampUnit(valueOf('energy')),
    curiosity: clampUnit(valueOf('curiosity')),
    frustration: clampUnit(valueOf('frustration')),
    motivation: clampUnit(valueOf('motivation')),
  })
}

/** Deltas proposed during one request, kept in proposal order */
export class DeltaBatch {
  private readonly deltas: EmotionDelta[] = []
  private applied = false

  constructor(readonly label: string) {}

  /** Queue a delta; false when the batch was already applied or the delta is not finite */
  propose(dimension: EmotionDimension, delta: number, reason: string, source: string): boolean {
    if (this.applied || !Number.isFinite(delta)) return false
    if (delta === 0) return true
    this.deltas.push({ dimension, delta, reason, source })
    return true
  }

  list(): readonly EmotionDelta[] {
    return [...this.deltas]
  }

  get size(): number {
    return this.deltas.length
  }

  isApplied(): boolean {
    return this.applied
  }

  /** @internal called by EmotionalState */
  markApplied(): void {
    this.applied = true
  }
}

export interface EmotionalStateOptions {
  initial?: Partial<Record<EmotionDimension, number>>
  /** Snapshot file overwritten on every apply; null keeps state in memory */
  filePath?: string | null
}

export class EmotionalState {
  private current: EmotionSnapshot
  private readonly filePath: string | null
  private readonly lock = createKeyedMutex()

  constructor(options: EmotionalStateOptions = {}) {
    this.filePath = options.filePath ?? null
    const persisted = this.filePath ? readJson(this.filePath, isEmotionSnapshot) : null
    const base = persisted ?? { ...NEUTRAL_EMOTIONS, ...options.initial }
    this.current = buildSnapshot(d => base[d] ?? NEUTRAL_EMOTIONS[d])
  }

  /** The last applied state; frozen */
  snapshot(): EmotionSnapshot {
    return this.current
  }

  createBatch(label: string): DeltaBatch {
    return new DeltaBatch(label)
  }

  /**
   * Apply a batch and return the new snapshot. A batch applies at most once;
   * re-applying returns the current snapshot unchanged.
   */
  async applyQueued(batch: DeltaBatch): Promise<EmotionSnapshot> {
    return this.lock.runExclusive(APPLY_KEY, () => {
      if (batch.isApplied()) return this.current
      batch.markApplied()
      if (batch.size === 0) return this.current

      const sums = new Map<EmotionDimension, number>()
      for (const { dimension, delta } of batch.list()) {
        sums.set(dimension, (sums.get(dimension) ?? 0) + delta)
      }

      const before = this.current
      this.current = buildSnapshot(d => before[d] + (sums.get(d) ?? 0))
      this.persist()

      const changed = EMOTION_DIMENSIONS.filter(d => this.current[d] !== before[d])
        .map(d => `${d} ${before[d].toFixed(2)}→${this.current[d].toFixed(2)}`)
        .join(', ')
      logger.debug(`Applied ${batch.size} delta(s) from ${batch.label}${changed ? `: ${changed}` : ''}`)
      return this.current
    })
  }

  private persist(): void {
    if (!this.filePath) return
    try {
      writeJson(this.filePath, this.current)
    } catch (error) {
      logError(logger, 'Failed to persist emotional snapshot', error)
    }
  }
}
