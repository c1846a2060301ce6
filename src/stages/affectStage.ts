/**
 * Affect — proposes emotion deltas and a memory boost for this request
 */

import { z } from 'zod'
import { ok, type Result } from '../shared/result.js'
import type { AppError } from '../shared/error.js'
import { EMOTION_DIMENSIONS } from '../emotion/types.js'
import { buildAffectPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, scaleDelta, type CompletionStageDeps } from './completeJson.js'
import type { AffectPayload, ProposedDelta, Stage, StageResult } from './types.js'

export interface AffectStageDeps extends CompletionStageDeps {
  /** Model deltas (-10..10) are divided by this */
  deltaScale: number
}

const rawDeltaSchema = z
  .object({
    delta: z.number().catch(0),
    reason: z.string().catch(''),
  })
  .catch({ delta: 0, reason: '' })

const affectSchema = z.object({
  primary_emotion: z.string().catch('neutral'),
  emotional_intensity: z.number().min(0).max(1).catch(0.3),
  memory_boost_factor: z.number().min(1).max(3).catch(1),
  emotional_tags: z.array(z.string()).catch([]),
  emotions_update: z.record(z.string(), rawDeltaSchema).catch({}),
  sentiment: z.enum(['positive', 'negative', 'neutral']).catch('neutral'),
  confidence: z.number().optional().catch(undefined),
})

export function createAffectStage(deps: AffectStageDeps): Stage<'affect'> {
  return {
    name: 'affect',

    async run(context, signal): Promise<Result<StageResult<AffectPayload>, AppError>> {
      const parsed = await completeJson(
        'affect',
        deps,
        buildAffectPrompt(context.inputText, context.emotionalSnapshot, context.stageResults.classifier?.payload),
        affectSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const data = parsed.value
      const emotionDeltas: ProposedDelta[] = []
      for (const dimension of EMOTION_DIMENSIONS) {
        const update = data.emotions_update[dimension]
        if (!update || update.delta === 0) continue
        emotionDeltas.push({
          dimension,
          delta: scaleDelta(update.delta, deps.deltaScale),
          reason: update.reason || `affect: ${data.primary_emotion}`,
        })
      }

      return ok({
        payload: {
          kind: 'affect',
          primaryEmotion: data.primary_emotion,
          intensity: data.emotional_intensity,
          sentiment: data.sentiment,
          memoryBoost: data.memory_boost_factor,
          tags: data.emotional_tags,
        },
        memoryWrites: [],
        reinforcements: [],
        emotionDeltas,
        confidence: clampConfidence(data.confidence),
      })
    },
  }
}
