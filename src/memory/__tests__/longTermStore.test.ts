import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { FileLongTermStore, rankEntries, scoreRelevance } from '../longTermStore.js'
import { contentSimilarity, queryCoverage, tokenize } from '../contentSimilarity.js'
import { makeEntry, makeTempDir, removeDir } from '../../../tests/helpers/fakes.js'

describe('contentSimilarity', () => {
  it('ignores case, punctuation and one-letter words', () => {
    expect([...tokenize("I'm at the café, a LOT!")]).toEqual(["i'm", 'at', 'the', 'café', 'lot'])
    expect(contentSimilarity('User likes jazz', 'user LIKES jazz!')).toBe(1)
  })

  it('divides the overlap by the larger word set', () => {
    expect(contentSimilarity('jazz concert', 'User likes jazz')).toBeCloseTo(1 / 3, 12)
  })

  it('is 0 for empty text', () => {
    expect(contentSimilarity('', 'User likes jazz')).toBe(0)
    expect(queryCoverage('', 'User likes jazz')).toBe(0)
  })

  it('measures query coverage against the query alone', () => {
    expect(queryCoverage('jazz concert', 'User likes jazz')).toBe(0.5)
  })
})

describe('rankEntries', () => {
  const entries = [
    makeEntry({ id: 'a', content: 'User likes jazz' }),
    makeEntry({ id: 'b', content: 'User went to a jazz concert in Lisbon' }),
    makeEntry({ id: 'c', content: 'Weather was rainy' }),
  ]

  it('returns the best matches first and drops unrelated entries', () => {
    const ranked = rankEntries(entries, 'jazz concert', 5)
    expect(ranked.map(r => r.entry.id)).toEqual(['b', 'a'])
    expect(ranked[1]?.relevance).toBeCloseTo(scoreRelevance('jazz concert', 'User likes jazz'), 12)
  })

  it('caps the result at k', () => {
    expect(rankEntries(entries, 'jazz concert', 1).map(r => r.entry.id)).toEqual(['b'])
  })

  it('returns nothing for k <= 0', () => {
    expect(rankEntries(entries, 'jazz concert', 0)).toEqual([])
  })
})

describe('FileLongTermStore', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeDir(dir)
  })

  it('stores entries and queries them back', async () => {
    const store = new FileLongTermStore(dir)
    expect((await store.put(makeEntry({ id: 'a', content: 'User likes jazz' }))).ok).toBe(true)
    expect((await store.put(makeEntry({ id: 'b', content: 'Weather was rainy' }))).ok).toBe(true)

    const result = await store.query('jazz', 3)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.map(r => r.entry.id)).toEqual(['a'])
    expect(store.count()).toBe(2)
  })

  it('survives a restart', async () => {
    await new FileLongTermStore(dir).put(makeEntry({ id: 'a' }))
    expect(new FileLongTermStore(dir).count()).toBe(1)
  })

  it('reports WriteFailed when the entry cannot be written', async () => {
    const store = new FileLongTermStore(dir)
    const result = await store.put(makeEntry({ id: 'not a safe id' }))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('WRITE_FAILED')
  })
})
