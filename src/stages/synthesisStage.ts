/**
 * Synthesis — turns classification, affect and recall into the reply
 */

import { z } from 'zod'
import { ok, err, type Result } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { buildSynthesisPrompt } from '../prompts/stagePrompts.js'
import { fallbackClassification } from './classifierStage.js'
import { clampConfidence, completeJson, scaleDelta, type CompletionStageDeps } from './completeJson.js'
import { RESPONSE_STRATEGIES, type ProposedDelta, type Stage, type StageResult, type SynthesisPayload } from './types.js'

export interface SynthesisStageDeps extends CompletionStageDeps {
  deltaScale: number
}

const synthesisSchema = z.object({
  reply: z.string(),
  response_strategy: z.enum(RESPONSE_STRATEGIES).catch('conversational'),
  tone: z.string().catch('friendly'),
  key_topics: z.array(z.string()).catch([]),
  emotional_tone_adjustment: z
    .object({
      happiness: z.number().optional().catch(undefined),
      trust: z.number().optional().catch(undefined),
    })
    .catch({}),
  confidence: z.number().optional().catch(undefined),
})

export function createSynthesisStage(deps: SynthesisStageDeps): Stage<'synthesis'> {
  return {
    name: 'synthesis',

    async run(context, signal): Promise<Result<StageResult<SynthesisPayload>, AppError>> {
      const { classifier, affect, recall } = context.stageResults
      const parsed = await completeJson(
        'synthesis',
        deps,
        buildSynthesisPrompt({
          input: context.inputText,
          history: context.history,
          emotions: context.emotionalSnapshot,
          personality: context.personality,
          classification: classifier?.payload ?? fallbackClassification(context),
          affect: affect?.payload,
          shortTerm: recall?.payload.shortTerm ?? [],
          longTerm: recall?.payload.longTerm ?? [],
        }),
        synthesisSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const data = parsed.value
      const reply = data.reply.trim()
      if (!reply) return err(AppError.stageFailed('synthesis', 'empty reply'))

      const emotionDeltas: ProposedDelta[] = []
      for (const dimension of ['happiness', 'trust'] as const) {
        const raw = data.emotional_tone_adjustment[dimension]
        if (raw === undefined || raw === 0) continue
        emotionDeltas.push({
          dimension,
          delta: scaleDelta(raw, deps.deltaScale),
          reason: `synthesis tone: ${data.tone}`,
        })
      }

      return ok({
        payload: {
          kind: 'synthesis',
          reply,
          strategy: data.response_strategy,
          tone: data.tone,
          keyTopics: data.key_topics,
        },
        memoryWrites: [],
        reinforcements: [],
        emotionDeltas,
        confidence: clampConfidence(data.confidence),
      })
    },
  }
}
