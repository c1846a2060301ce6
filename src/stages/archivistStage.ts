/**
 * Archivist — background upkeep of the personality notes
 */

import { z } from 'zod'
import { ok, type Result } from '../shared/result.js'
import type { AppError } from '../shared/error.js'
import type { BackgroundContext } from '../pipeline/types.js'
import { PERSONALITY_SECTIONS } from '../memory/types.js'
import { buildArchivistPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, type CompletionStageDeps } from './completeJson.js'
import { emptyResult, type ArchivistPayload, type NoteUpdate, type Stage, type StageResult } from './types.js'

const noteSchema = z.object({
  section: z.enum(PERSONALITY_SECTIONS),
  key: z.string().trim().min(1),
  value: z.string().trim().min(1),
})

const archivistSchema = z.object({
  notes: z.array(z.unknown()).catch([]),
  rationale: z.string().catch(''),
  confidence: z.number().optional().catch(undefined),
})

export function createArchivistStage(deps: CompletionStageDeps): Stage<'archivist', BackgroundContext> {
  return {
    name: 'archivist',

    async run(context, signal): Promise<Result<StageResult<ArchivistPayload>, AppError>> {
      const parsed = await completeJson(
        'archivist',
        deps,
        buildArchivistPrompt(context.inputText, context.reply, context.personality),
        archivistSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const notes: NoteUpdate[] = []
      for (const item of parsed.value.notes) {
        const note = noteSchema.safeParse(item)
        if (note.success) notes.push(note.data)
      }

      return ok(
        emptyResult<ArchivistPayload>(
          { kind: 'archivist', notes, rationale: parsed.value.rationale },
          clampConfidence(parsed.value.confidence)
        )
      )
    },
  }
}
