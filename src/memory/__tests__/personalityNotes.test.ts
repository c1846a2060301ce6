import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { writeFileSync } from 'fs'
import { PersonalityNotesStore } from '../personalityNotes.js'
import { createManualClock, makeTempDir, removeDir, T0 } from '../../../tests/helpers/fakes.js'

describe('PersonalityNotesStore', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeDir(dir)
  })

  it('appends a note with its source and time', async () => {
    const store = new PersonalityNotesStore(null, createManualClock().clock)
    const added = await store.addNote({ section: 'user', key: 'music', value: 'likes jazz', source: 'archivist' })

    expect(added).toEqual({ ok: true, value: true })
    expect(store.getNotes().user).toEqual([
      { key: 'music', value: 'likes jazz', source: 'archivist', at: new Date(T0).toISOString() },
    ])
  })

  it('skips blank and duplicate notes', async () => {
    const store = new PersonalityNotesStore(null)
    await store.addNote({ section: 'user', key: 'music', value: 'likes jazz', source: 'archivist' })

    expect(await store.addNote({ section: 'user', key: ' Music ', value: 'Likes  JAZZ', source: 'tool' })).toEqual({
      ok: true,
      value: false,
    })
    expect(await store.addNote({ section: 'soul', key: 'mood', value: '   ', source: 'tool' })).toEqual({
      ok: true,
      value: false,
    })
    expect(store.getNotes().user).toHaveLength(1)
    expect(store.getNotes().soul).toEqual([])
  })

  it('keeps the same key with a new value as a separate note', async () => {
    const store = new PersonalityNotesStore(null)
    await store.addNote({ section: 'preferences', key: 'genre', value: 'jazz', source: 'tool' })
    await store.addNote({ section: 'preferences', key: 'genre', value: 'blues', source: 'tool' })
    expect(store.getNotes().preferences.map(n => n.value)).toEqual(['jazz', 'blues'])
  })

  it('formats the latest notes per section', async () => {
    const store = new PersonalityNotesStore(null)
    await store.addNote({ section: 'user', key: 'music', value: 'likes jazz', source: 'archivist' })
    await store.addNote({ section: 'soul', key: 'style', value: 'curious', source: 'archivist' })
    await store.addNote({ section: 'user', key: 'city', value: 'Lisbon', source: 'archivist' })

    expect(store.formatForPrompt()).toBe('[soul]\n- style: curious\n[user]\n- music: likes jazz\n- city: Lisbon')
    expect(store.formatForPrompt(1)).toBe('[soul]\n- style: curious\n[user]\n- city: Lisbon')
    expect(new PersonalityNotesStore(null).formatForPrompt()).toBe('')
  })

  it('reloads notes from disk', async () => {
    const filePath = join(dir, 'personality.json')
    await new PersonalityNotesStore(filePath).addNote({
      section: 'user',
      key: 'music',
      value: 'likes jazz',
      source: 'archivist',
    })
    expect(new PersonalityNotesStore(filePath).getNotes().user.map(n => n.key)).toEqual(['music'])
  })

  it('reports StorageUnavailable when the file cannot be written', async () => {
    const blocker = join(dir, 'blocker')
    writeFileSync(blocker, 'not a directory')
    const store = new PersonalityNotesStore(join(blocker, 'personality.json'))

    const result = await store.addNote({ section: 'user', key: 'music', value: 'likes jazz', source: 'archivist' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('STORAGE_UNAVAILABLE')
    expect(store.getNotes().user).toEqual([])
  })
})
