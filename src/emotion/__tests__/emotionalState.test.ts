import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { EmotionalState, NEUTRAL_EMOTIONS, clampUnit } from '../emotionalState.js'
import { makeTempDir, removeDir } from '../../../tests/helpers/fakes.js'

describe('clampUnit', () => {
  it('limits values to [0, 1]', () => {
    expect(clampUnit(1.7)).toBe(1)
    expect(clampUnit(-0.2)).toBe(0)
    expect(clampUnit(0.42)).toBe(0.42)
    expect(clampUnit(Number.NaN)).toBe(0)
  })
})

describe('EmotionalState', () => {
  it('starts from the neutral defaults', () => {
    expect(new EmotionalState().snapshot()).toEqual(NEUTRAL_EMOTIONS)
  })

  it('takes initial values and clamps them', () => {
    const state = new EmotionalState({ initial: { trust: 0.9, energy: 4 } })
    expect(state.snapshot()).toMatchObject({ trust: 0.9, energy: 1, happiness: 0.5 })
  })

  it('clamps +10 on 0.9 to exactly 1.0', async () => {
    const state = new EmotionalState({ initial: { happiness: 0.9 } })
    const batch = state.createBatch('req-1')
    batch.propose('happiness', 10, 'great news', 'affect')

    const snapshot = await state.applyQueued(batch)
    expect(snapshot.happiness).toBe(1)
  })

  it('sums deltas per dimension before clamping', async () => {
    const state = new EmotionalState({ initial: { happiness: 0.9 } })
    const batch = state.createBatch('req-1')
    batch.propose('happiness', 0.3, 'good', 'affect')
    batch.propose('happiness', -0.3, 'but tired', 'synthesis')

    expect((await state.applyQueued(batch)).happiness).toBe(0.9)
  })

  it('applies a batch only once', async () => {
    const state = new EmotionalState()
    const batch = state.createBatch('req-1')
    batch.propose('trust', 0.1, 'kind words', 'affect')

    await state.applyQueued(batch)
    const again = await state.applyQueued(batch)
    expect(again.trust).toBeCloseTo(0.6, 12)
    expect(batch.propose('trust', 0.1, 'late', 'reward')).toBe(false)
  })

  it('rejects non-finite deltas and skips zero deltas', () => {
    const batch = new EmotionalState().createBatch('req-1')
    expect(batch.propose('energy', Number.NaN, 'broken', 'affect')).toBe(false)
    expect(batch.propose('energy', 0, 'nothing', 'affect')).toBe(true)
    expect(batch.size).toBe(0)
  })

  it('serializes concurrent applies', async () => {
    const state = new EmotionalState()
    const first = state.createBatch('req-1')
    const second = state.createBatch('req-2')
    first.propose('curiosity', 0.2, 'new topic', 'affect')
    second.propose('curiosity', 0.2, 'another topic', 'affect')

    await Promise.all([state.applyQueued(first), state.applyQueued(second)])
    expect(state.snapshot().curiosity).toBeCloseTo(0.9, 12)
  })

  it('returns frozen snapshots', () => {
    expect(Object.isFrozen(new EmotionalState().snapshot())).toBe(true)
  })

  describe('persistence', () => {
    let dir: string

    beforeEach(() => {
      dir = makeTempDir()
    })

    afterEach(() => {
      removeDir(dir)
    })

    it('reloads the last applied state', async () => {
      const filePath = join(dir, 'emotions.json')
      const state = new EmotionalState({ filePath })
      const batch = state.createBatch('req-1')
      batch.propose('frustration', 0.25, 'slow answer', 'reward')
      await state.applyQueued(batch)

      const reloaded = new EmotionalState({ filePath, initial: { frustration: 0.9 } })
      expect(reloaded.snapshot().frustration).toBe(0.25)
    })
  })
})
