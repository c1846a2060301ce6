import { describe, it, expect } from 'vitest'
import { createKeyedMutex, createSlotPool, deepFreeze, sleep } from '../concurrency.js'

describe('createSlotPool', () => {
  it('never runs more than max at once', async () => {
    const pool = createSlotPool(2)
    let active = 0
    let peak = 0

    await Promise.all(
      Array.from({ length: 6 }, () =>
        pool.run(async () => {
          active++
          peak = Math.max(peak, active)
          await sleep(5)
          active--
        })
      )
    )

    expect(peak).toBe(2)
    expect(pool.info()).toEqual({ active: 0, waiting: 0, max: 2 })
  })

  it('releases the slot when the task throws', async () => {
    const pool = createSlotPool(1)
    await expect(pool.run(async () => Promise.reject(new Error('fail')))).rejects.toThrow('fail')
    await expect(pool.run(async () => 'next')).resolves.toBe('next')
  })

  it('treats a size below one as one', () => {
    expect(createSlotPool(0).info().max).toBe(1)
  })
})

describe('createKeyedMutex', () => {
  it('serialises holders of the same key', async () => {
    const mutex = createKeyedMutex()
    const order: string[] = []

    await Promise.all([
      mutex.runExclusive('entry', async () => {
        order.push('a:start')
        await sleep(10)
        order.push('a:end')
      }),
      mutex.runExclusive('entry', async () => {
        order.push('b:start')
        order.push('b:end')
      }),
    ])

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  it('lets different keys run side by side', async () => {
    const mutex = createKeyedMutex()
    const order: string[] = []

    await Promise.all([
      mutex.runExclusive('one', async () => {
        order.push('one:start')
        await sleep(10)
        order.push('one:end')
      }),
      mutex.runExclusive('two', async () => {
        order.push('two')
      }),
    ])

    expect(order).toEqual(['one:start', 'two', 'one:end'])
  })

  it('frees the key after a holder throws', async () => {
    const mutex = createKeyedMutex()
    await expect(
      mutex.runExclusive('k', () => {
        throw new Error('inside')
      })
    ).rejects.toThrow('inside')
    await expect(mutex.runExclusive('k', () => 'after')).resolves.toBe('after')
  })
})

describe('sleep', () => {
  it('returns early when the signal aborts', async () => {
    const controller = new AbortController()
    const started = Date.now()
    setTimeout(() => controller.abort(), 5)

    await sleep(5000, controller.signal)
    expect(Date.now() - started).toBeLessThan(1000)
  })

  it('returns at once for an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(sleep(5000, controller.signal)).resolves.toBeUndefined()
  })
})

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = deepFreeze({ a: { b: [1, { c: 2 }] } })
    expect(Object.isFrozen(value)).toBe(true)
    expect(Object.isFrozen(value.a)).toBe(true)
    expect(Object.isFrozen(value.a.b)).toBe(true)
    expect(Object.isFrozen(value.a.b[1])).toBe(true)
  })
})
