/**
 * Shared plumbing for stages that ask the completion service for JSON
 */

import type { z } from 'zod'
import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { completeWithRetry } from '../backend/completeWithRetry.js'
import type { TextCompletionService } from '../backend/types.js'
import type { StagePrompt } from '../prompts/stagePrompts.js'
import type { StageName } from './types.js'

export interface CompletionStageDeps {
  completion: TextCompletionService
  maxTokens: number
  retryBackoffMs: number
}

/** 0..1 confidence, 0.5 when missing or out of range */
export function clampConfidence(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0.5
  return Math.min(1, Math.max(0, value))
}

/** Pull the outermost {...} out of a model reply and validate it */
export function parseStageJson<S extends z.ZodTypeAny>(text: string, schema: S): Result<z.output<S>, string> {
  const match = text.match(/\{[\s\S]*\}/)
  if (!match) return err('no JSON object in response')

  let raw: unknown
  try {
    raw = JSON.parse(match[0])
  } catch {
    return err('malformed JSON in response')
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    return err(parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '))
  }
  return ok(parsed.data)
}

export async function completeJson<S extends z.ZodTypeAny>(
  stage: StageName,
  deps: CompletionStageDeps,
  prompt: StagePrompt,
  schema: S,
  signal: AbortSignal
): Promise<Result<z.output<S>, AppError>> {
  const completion = await completeWithRetry(
    deps.completion,
    { prompt: prompt.user, system: prompt.system, maxTokens: deps.maxTokens, stage, signal },
    deps.retryBackoffMs
  )
  if (!completion.ok) {
    return err(AppError.provider(completion.error.type, completion.error.message))
  }

  const parsed = parseStageJson(completion.value.text, schema)
  if (!parsed.ok) {
    return err(AppError.stageFailed(stage, `unusable response (${parsed.error})`))
  }
  return parsed
}

/** Model deltas arrive as -10..10; limit them, then bring them to state scale */
export function scaleDelta(raw: number, deltaScale: number): number {
  return Math.max(-10, Math.min(10, raw)) / deltaScale
}
