/**
 * Reward — background rating of the exchange; may nudge motivation
 */

import { z } from 'zod'
import { ok, type Result } from '../shared/result.js'
import type { AppError } from '../shared/error.js'
import type { BackgroundContext } from '../pipeline/types.js'
import { buildRewardPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, scaleDelta, type CompletionStageDeps } from './completeJson.js'
import type { ProposedDelta, RewardPayload, Stage, StageResult } from './types.js'

export interface RewardStageDeps extends CompletionStageDeps {
  deltaScale: number
}

const rewardSchema = z.object({
  satisfaction_score: z.number().min(0).max(1).catch(0.5),
  reward_prediction_error: z.number().min(-1).max(1).catch(0),
  interaction_quality: z.enum(['excellent', 'good', 'neutral', 'poor', 'bad']).catch('neutral'),
  motivation_delta: z.number().catch(0),
  reason: z.string().catch(''),
  confidence: z.number().optional().catch(undefined),
})

export function createRewardStage(deps: RewardStageDeps): Stage<'reward', BackgroundContext> {
  return {
    name: 'reward',

    async run(context, signal): Promise<Result<StageResult<RewardPayload>, AppError>> {
      const parsed = await completeJson(
        'reward',
        deps,
        buildRewardPrompt(context.inputText, context.reply, context.emotionalSnapshot),
        rewardSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const data = parsed.value
      const emotionDeltas: ProposedDelta[] =
        data.motivation_delta === 0
          ? []
          : [
              {
                dimension: 'motivation',
                delta: scaleDelta(data.motivation_delta, deps.deltaScale),
                reason: data.reason || `reward: ${data.interaction_quality}`,
              },
            ]

      return ok({
        payload: {
          kind: 'reward',
          satisfaction: data.satisfaction_score,
          quality: data.interaction_quality,
          predictionError: data.reward_prediction_error,
        },
        memoryWrites: [],
        reinforcements: [],
        emotionDeltas,
        confidence: clampConfidence(data.confidence),
      })
    },
  }
}
