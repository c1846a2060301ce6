/**
 * Cooperative concurrency primitives
 *
 * - SlotPool: fixed number of concurrent slots with a FIFO wait queue
 * - KeyedMutex: one holder per key (per memory entry, or a single apply section)
 */

export interface SlotPool {
  /** Run fn once a slot is free; the slot is released when fn settles */
  run<T>(fn: () => Promise<T>): Promise<T>
  info(): { active: number; waiting: number; max: number }
}

export function createSlotPool(maxConcurrent: number): SlotPool {
  const max = Math.max(1, Math.floor(maxConcurrent))
  let active = 0
  const waitQueue: Array<() => void> = []

  function acquire(): Promise<void> {
    if (active < max) {
      active++
      return Promise.resolve()
    }
    return new Promise(resolve => {
      waitQueue.push(() => {
        active++
        resolve()
      })
    })
  }

  function release(): void {
    active--
    const next = waitQueue.shift()
    if (next) next()
  }

  return {
    async run<T>(fn: () => Promise<T>): Promise<T> {
      await acquire()
      try {
        return await fn()
      } finally {
        release()
      }
    },
    info() {
      return { active, waiting: waitQueue.length, max }
    },
  }
}

export interface KeyedMutex {
  runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T>
}

export function createKeyedMutex(): KeyedMutex {
  // Tail of the chain per key; removed when the last holder finishes
  const tails = new Map<string, Promise<void>>()

  return {
    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve()
      let release: () => void = () => {}
      const current = new Promise<void>(resolve => {
        release = resolve
      })
      const tail = previous.then(() => current)
      tails.set(key, tail)

      await previous
      try {
        return await fn()
      } finally {
        release()
        if (tails.get(key) === tail) tails.delete(key)
      }
    },
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}

/** Recursively freeze a cloned value; used for background context snapshots */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const key of Object.getOwnPropertyNames(value)) {
      deepFreeze(Reflect.get(value, key))
    }
  }
  return value
}
