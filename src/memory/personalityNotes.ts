/**
 * Personality notes — what the agent has learned about itself (soul), the
 * user, and the user's preferences. Written by background stages only.
 */

import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createKeyedMutex } from '../shared/concurrency.js'
import { createLogger } from '../shared/logger.js'
import { readJson, writeJson } from '../store/readWriteJson.js'
import { isPersonalityNotes } from '../store/schemas.js'
import type { Clock, PersonalityNote, PersonalityNotes, PersonalitySection } from './types.js'

const logger = createLogger('personality')

const WRITE_KEY = 'personality'

function emptyNotes(): PersonalityNotes {
  return { soul: [], user: [], preferences: [] }
}

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ')
}

export interface NoteInput {
  section: PersonalitySection
  key: string
  value: string
  source: string
}

export class PersonalityNotesStore {
  private notes: PersonalityNotes
  private readonly locks = createKeyedMutex()

  constructor(
    private readonly filePath: string | null,
    private readonly clock: Clock = Date.now
  ) {
    this.notes = (filePath && readJson(filePath, isPersonalityNotes)) || emptyNotes()
  }

  getNotes(): PersonalityNotes {
    return {
      soul: [...this.notes.soul],
      user: [...this.notes.user],
      preferences: [...this.notes.preferences],
    }
  }

  /**
   * Append a note. Resolves ok(false) for a blank value or when the section
   * already holds the same key with the same value.
   */
  async addNote(input: NoteInput): Promise<Result<boolean, AppError>> {
    return this.locks.runExclusive(WRITE_KEY, async () => {
      const key = input.key.trim()
      const value = input.value.trim()
      if (!key || !value) return ok(false)

      const existing = this.notes[input.section]
      const duplicate = existing.some(
        n => normalize(n.key) === normalize(key) && normalize(n.value) === normalize(value)
      )
      if (duplicate) return ok(false)

      const note: PersonalityNote = {
        key,
        value,
        source: input.source,
        at: new Date(this.clock()).toISOString(),
      }
      const next: PersonalityNotes = { ...this.notes, [input.section]: [...existing, note] }

      if (this.filePath) {
        try {
          writeJson(this.filePath, next)
        } catch (error) {
          return err(AppError.storageUnavailable('personality note', error))
        }
      }
      this.notes = next
      logger.debug(`${input.section}.${key} ← ${input.source}`)
      return ok(true)
    })
  }

  /** Latest notes per section as prompt lines */
  formatForPrompt(perSection: number = 5): string {
    const lines: string[] = []
    for (const section of ['soul', 'user', 'preferences'] as const) {
      const recent = this.notes[section].slice(-perSection)
      if (recent.length === 0) continue
      lines.push(`[${section}]`)
      for (const note of recent) lines.push(`- ${note.key}: ${note.value}`)
    }
    return lines.join('\n')
  }
}
