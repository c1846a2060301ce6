/**
 * Short-term memory tier
 *
 * Entries live in an in-process map (the read view) backed by a persistence
 * layer. Every write to an entry runs under that entry's lock and replaces the
 * map value with a new frozen object only after the write is persisted, so
 * readers see either the old entry or the new one.
 *
 * The store never talks to long-term storage itself: `sweep()` returns a
 * decision and `promote()` takes the adapter's put as a callback.
 */

import { generateId } from '../shared/generateId.js'
import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createKeyedMutex } from '../shared/concurrency.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger, logError } from '../shared/logger.js'
import { FileStore } from '../store/GenericFileStore.js'
import { isMemoryEntry } from '../store/schemas.js'
import { DEFAULT_DECAY_PARAMS, strengthAt, type DecayParams } from './decayModel.js'
import type {
  Clock,
  MemoryCategory,
  MemoryEntry,
  MemoryImportance,
  SweepCandidate,
  SweepDecision,
} from './types.js'

const logger = createLogger('short-term')

export interface ShortTermPersistence {
  loadAll(): MemoryEntry[]
  save(entry: MemoryEntry): Promise<void>
  /** Resolves false when nothing was stored under the id */
  remove(id: string): Promise<boolean>
}

export function createFilePersistence(dir: string): ShortTermPersistence {
  const store = new FileStore<MemoryEntry>({ dir, validate: isMemoryEntry })
  return {
    loadAll: () => store.getAllSync(),
    save: entry => store.set(entry.id, entry),
    remove: id => store.delete(id),
  }
}

/** Non-durable persistence, for ephemeral runtimes */
export function createInMemoryPersistence(seed: MemoryEntry[] = []): ShortTermPersistence {
  const records = new Map(seed.map(e => [e.id, e]))
  return {
    loadAll: () => [...records.values()],
    save: async entry => {
      records.set(entry.id, entry)
    },
    remove: async id => records.delete(id),
  }
}

export interface ShortTermThresholds {
  evictionFloor: number
  promotionCeiling: number
  promotionRepeatThreshold: number
  minPromotionAgeSeconds: number
}

export const DEFAULT_SHORT_TERM_THRESHOLDS: ShortTermThresholds = {
  evictionFloor: 0.05,
  promotionCeiling: 0.8,
  promotionRepeatThreshold: 3,
  minPromotionAgeSeconds: 3600,
}

export interface ShortTermStoreOptions {
  persistence: ShortTermPersistence
  decay?: DecayParams
  thresholds?: Partial<ShortTermThresholds>
  clock?: Clock
}

export interface ListActiveOptions {
  category?: MemoryCategory
  /** Exclusive lower bound on recomputed strength, default 0 */
  minStrength?: number
}

export type PutToLongTerm = (entry: MemoryEntry) => Promise<Result<void, AppError>>

export class ShortTermStore {
  private readonly entries = new Map<string, MemoryEntry>()
  private readonly locks = createKeyedMutex()
  private readonly pendingRemovals = new Set<string>()
  private readonly persistence: ShortTermPersistence
  private readonly decay: DecayParams
  private readonly thresholds: ShortTermThresholds
  private readonly clock: Clock

  constructor(options: ShortTermStoreOptions) {
    this.persistence = options.persistence
    this.decay = options.decay ?? DEFAULT_DECAY_PARAMS
    this.thresholds = { ...DEFAULT_SHORT_TERM_THRESHOLDS, ...options.thresholds }
    this.clock = options.clock ?? Date.now

    try {
      for (const entry of this.persistence.loadAll()) {
        this.entries.set(entry.id, Object.freeze({ ...entry }))
      }
    } catch (error) {
      // Unreadable medium: start empty, writes will report StorageUnavailable
      logError(logger, 'Failed to load short-term entries', error)
    }
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString()
  }

  private strengthOf(entry: MemoryEntry, nowMs: number): number {
    return strengthAt(entry, nowMs, this.decay)
  }

  /**
   * Create a new entry with strength 1.0. Additions never merge into an
   * existing entry, even for identical content or category.
   */
  async add(
    content: string,
    category: MemoryCategory,
    importance: MemoryImportance
  ): Promise<Result<string, AppError>> {
    const now = this.nowIso()
    const entry: MemoryEntry = {
      id: generateId(),
      content,
      category,
      importance,
      createdAt: now,
      lastReinforcedAt: now,
      reinforcementCount: 0,
      strength: 1,
    }

    return this.locks.runExclusive(entry.id, async () => {
      try {
        await this.persistence.save(entry)
      } catch (error) {
        return err(AppError.storageUnavailable('add', error))
      }
      this.entries.set(entry.id, Object.freeze(entry))
      logger.debug(`Added ${entry.id} (${category}/${importance})`)
      return ok(entry.id)
    })
  }

  /** Reset the decay clock of an entry and count one more repetition */
  async reinforce(id: string): Promise<Result<MemoryEntry, AppError>> {
    return this.locks.runExclusive(id, async () => {
      const entry = this.entries.get(id)
      if (!entry) return err(AppError.notFound('memory entry', id))

      const updated: MemoryEntry = {
        ...entry,
        lastReinforcedAt: this.nowIso(),
        reinforcementCount: entry.reinforcementCount + 1,
        strength: 1,
      }
      try {
        await this.persistence.save(updated)
      } catch (error) {
        return err(AppError.storageUnavailable('reinforce', error))
      }
      this.entries.set(id, Object.freeze(updated))
      return ok(updated)
    })
  }

  get(id: string): MemoryEntry | undefined {
    const entry = this.entries.get(id)
    return entry ? { ...entry, strength: this.strengthOf(entry, this.clock()) } : undefined
  }

  size(): number {
    return this.entries.size
  }

  /**
   * Entries whose recomputed strength exceeds `minStrength`, strongest first,
   * ties broken by most recent reinforcement. Read-only.
   */
  listActive(options: ListActiveOptions = {}): MemoryEntry[] {
    const nowMs = this.clock()
    const minStrength = options.minStrength ?? 0
    const active: MemoryEntry[] = []

    for (const entry of this.entries.values()) {
      if (options.category && entry.category !== options.category) continue
      const strength = this.strengthOf(entry, nowMs)
      if (strength > minStrength) active.push({ ...entry, strength })
    }

    return active.sort(
      (a, b) =>
        b.strength - a.strength || Date.parse(b.lastReinforcedAt) - Date.parse(a.lastReinforcedAt)
    )
  }

  /**
   * Classify every entry at the current time. Does not mutate anything.
   *
   * - strength < evictionFloor → evict
   * - otherwise, old enough and (strength >= promotionCeiling or
   *   reinforcementCount >= promotionRepeatThreshold) → promote
   * - everything else is retained
   */
  sweep(): SweepDecision {
    const nowMs = this.clock()
    const { evictionFloor, promotionCeiling, promotionRepeatThreshold, minPromotionAgeSeconds } =
      this.thresholds
    const decision: SweepDecision = {
      promote: [],
      evict: [],
      retain: [],
      scannedAt: new Date(nowMs).toISOString(),
    }

    for (const entry of this.entries.values()) {
      const strength = this.strengthOf(entry, nowMs)
      const candidate: SweepCandidate = { entry: { ...entry, strength }, strength }

      if (strength < evictionFloor) {
        decision.evict.push(candidate)
        continue
      }

      const ageSeconds = (nowMs - Date.parse(entry.createdAt)) / 1000
      const qualifies =
        strength >= promotionCeiling || entry.reinforcementCount >= promotionRepeatThreshold
      if (qualifies && ageSeconds >= minPromotionAgeSeconds) {
        decision.promote.push(candidate)
      } else {
        decision.retain.push(candidate)
      }
    }

    return decision
  }

  /**
   * Hand an entry to long-term storage, then drop the short-term copy.
   * If `put` fails or throws the entry stays here untouched. If the copy on
   * the medium cannot be removed, the entry is hidden from this tier and the
   * removal is retried by `retryPendingRemovals()`.
   */
  async promote(id: string, put: PutToLongTerm): Promise<Result<MemoryEntry, AppError>> {
    return this.locks.runExclusive(id, async () => {
      const entry = this.entries.get(id)
      if (!entry) return err(AppError.notFound('memory entry', id))

      const copy: MemoryEntry = { ...entry, strength: this.strengthOf(entry, this.clock()) }
      let written: Result<void, AppError>
      try {
        written = await put(copy)
      } catch (error) {
        return err(AppError.writeFailed(id, error))
      }
      if (!written.ok) return written

      this.entries.delete(id)
      try {
        await this.persistence.remove(id)
      } catch (error) {
        this.pendingRemovals.add(id)
        logError(logger, 'Promoted entry could not be removed from the medium', error, { entryId: id })
      }
      return ok(copy)
    })
  }

  /** Promoted ids whose short-term copy is still on the medium */
  pendingRemovalCount(): number {
    return this.pendingRemovals.size
  }

  /** Remove leftover copies of promoted entries; resolves how many are gone now */
  async retryPendingRemovals(): Promise<number> {
    let removed = 0
    for (const id of [...this.pendingRemovals]) {
      const done = await this.locks.runExclusive(id, async () => {
        try {
          await this.persistence.remove(id)
        } catch (error) {
          logger.warn(`Removal of promoted ${id} still failing: ${getErrorMessage(error)}`)
          return false
        }
        this.pendingRemovals.delete(id)
        return true
      })
      if (done) removed++
    }
    return removed
  }

  /**
   * Delete an entry that is still below the eviction floor. Resolves ok(false)
   * when a reinforcement since the sweep lifted it back above the floor.
   */
  async evict(id: string): Promise<Result<boolean, AppError>> {
    return this.locks.runExclusive(id, async () => {
      const entry = this.entries.get(id)
      if (!entry) return err(AppError.notFound('memory entry', id))
      if (this.strengthOf(entry, this.clock()) >= this.thresholds.evictionFloor) return ok(false)

      try {
        await this.persistence.remove(id)
      } catch (error) {
        return err(AppError.storageUnavailable('evict', error))
      }
      this.entries.delete(id)
      return ok(true)
    })
  }

  /** Persist the recomputed strength of a retained entry */
  async refreshStrength(id: string): Promise<Result<number, AppError>> {
    return this.locks.runExclusive(id, async () => {
      const entry = this.entries.get(id)
      if (!entry) return err(AppError.notFound('memory entry', id))

      const updated: MemoryEntry = { ...entry, strength: this.strengthOf(entry, this.clock()) }
      try {
        await this.persistence.save(updated)
      } catch (error) {
        return err(AppError.storageUnavailable('refresh', error))
      }
      this.entries.set(id, Object.freeze(updated))
      return ok(updated.strength)
    })
  }
}
