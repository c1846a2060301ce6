/**
 * In-process stand-ins for the runtime's external seams:
 * completion service, long-term adapter, short-term medium and the clock.
 */

import { mkdtempSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { AppError } from '../../src/shared/error.js'
import { ok, err, type Result } from '../../src/shared/result.js'
import { rankEntries, type LongTermStoreAdapter } from '../../src/memory/longTermStore.js'
import { createInMemoryPersistence, type ShortTermPersistence } from '../../src/memory/shortTermStore.js'
import type { MemoryEntry, RankedMemory } from '../../src/memory/types.js'
import type {
  CompletionError,
  CompletionRequest,
  CompletionResult,
  TextCompletionService,
} from '../../src/backend/types.js'

// ============ Clock ============

export const T0 = Date.parse('2025-03-01T00:00:00.000Z')

export interface ManualClock {
  clock: () => number
  advanceSeconds(seconds: number): void
  now(): number
}

export function createManualClock(start: number = T0): ManualClock {
  let current = start
  return {
    clock: () => current,
    advanceSeconds(seconds: number) {
      current += seconds * 1000
    },
    now: () => current,
  }
}

// ============ Temp dirs ============

export function makeTempDir(prefix: string = 'cogrt-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix))
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

// ============ Completion service ============

type CompletionOutcome = Result<CompletionResult, CompletionError>

export type ScriptedReply =
  | string
  | { error: CompletionError }
  | ((request: CompletionRequest) => Promise<CompletionOutcome>)

/**
 * Answers by stage name: queued replies first, then the stage's default.
 * A stage with neither answers `unavailable`.
 */
export class ScriptedCompletionService implements TextCompletionService {
  readonly name = 'scripted'
  readonly calls: CompletionRequest[] = []
  private readonly queues = new Map<string, ScriptedReply[]>()

  constructor(private readonly defaults: Partial<Record<string, ScriptedReply>> = {}) {}

  enqueue(stage: string, ...replies: ScriptedReply[]): this {
    this.queues.set(stage, [...(this.queues.get(stage) ?? []), ...replies])
    return this
  }

  setDefault(stage: string, reply: ScriptedReply): this {
    this.defaults[stage] = reply
    return this
  }

  callsFor(stage: string): CompletionRequest[] {
    return this.calls.filter(c => c.stage === stage)
  }

  async complete(request: CompletionRequest): Promise<CompletionOutcome> {
    this.calls.push(request)
    const stage = request.stage ?? ''
    const reply = this.queues.get(stage)?.shift() ?? this.defaults[stage]

    if (reply === undefined) {
      return err({ type: 'unavailable', message: `no scripted reply for ${stage}` })
    }
    if (typeof reply === 'string') {
      return ok({ text: reply, model: 'scripted', durationMs: 0 })
    }
    if (typeof reply === 'function') {
      return reply(request)
    }
    return err(reply.error)
  }
}

/** Never answers on its own; resolves `timeout` once the stage deadline aborts it */
export function hangUntilAborted(request: CompletionRequest): Promise<CompletionOutcome> {
  return new Promise(resolve => {
    request.signal?.addEventListener(
      'abort',
      () => resolve(err({ type: 'timeout', message: 'aborted' })),
      { once: true }
    )
  })
}

export function json(value: unknown): string {
  return JSON.stringify(value)
}

// ============ Long-term adapter ============

export class InMemoryLongTermStore implements LongTermStoreAdapter {
  readonly entries = new Map<string, MemoryEntry>()
  queries = 0
  failPuts = false
  failQueries = false
  /** Reject instead of returning err, like a client whose connection drops */
  throwOnPut = false
  throwOnQuery = false
  putCalls = 0

  async put(entry: MemoryEntry): Promise<Result<void, AppError>> {
    this.putCalls++
    if (this.throwOnPut) throw new Error('ECONNRESET')
    if (this.failPuts) return err(AppError.writeFailed(entry.id, new Error('index offline')))
    this.entries.set(entry.id, entry)
    return ok(undefined)
  }

  async query(text: string, k: number): Promise<Result<RankedMemory[], AppError>> {
    this.queries++
    if (this.throwOnQuery) throw new Error('ECONNRESET')
    if (this.failQueries) return err(AppError.storageUnavailable('long-term query', new Error('index offline')))
    return ok(rankEntries(this.entries.values(), text, k))
  }
}

// ============ Short-term medium ============

export interface FlakyPersistence {
  persistence: ShortTermPersistence
  control: { failSaves: boolean; failRemoves: boolean; failLoad: boolean }
}

/** In-memory medium whose writes can be switched to fail */
export function createFlakyPersistence(seed: MemoryEntry[] = []): FlakyPersistence {
  const inner = createInMemoryPersistence(seed)
  const control = { failSaves: false, failRemoves: false, failLoad: false }
  return {
    control,
    persistence: {
      loadAll() {
        if (control.failLoad) throw new Error('medium unreadable')
        return inner.loadAll()
      },
      async save(entry) {
        if (control.failSaves) throw new Error('medium unavailable')
        await inner.save(entry)
      },
      async remove(id) {
        if (control.failRemoves) throw new Error('medium unavailable')
        return inner.remove(id)
      },
    },
  }
}

export function makeEntry(overrides: Partial<MemoryEntry> = {}): MemoryEntry {
  const at = new Date(T0).toISOString()
  return {
    id: 'entry-1',
    content: 'User likes jazz',
    category: 'user',
    importance: 'high',
    createdAt: at,
    lastReinforcedAt: at,
    reinforcementCount: 0,
    strength: 1,
    ...overrides,
  }
}
