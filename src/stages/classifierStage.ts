/**
 * Classifier — runs first and alone; labels input type, language and urgency
 */

import { z } from 'zod'
import { ok, type Result } from '../shared/result.js'
import type { AppError } from '../shared/error.js'
import { buildClassifierPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, type CompletionStageDeps } from './completeJson.js'
import { INPUT_TYPES, URGENCY_LEVELS, emptyResult, type ClassifierPayload, type Stage, type StageResult } from './types.js'
import type { PipelineContext } from '../pipeline/types.js'

const classifierSchema = z.object({
  input_type: z.enum(INPUT_TYPES).catch('conversation'),
  language: z.string().trim().min(2).max(8).optional().catch(undefined),
  urgency: z.enum(URGENCY_LEVELS).catch('medium'),
  emotional_content: z.boolean().catch(false),
  requires_memory_search: z.boolean().catch(true),
  requires_tools: z.boolean().catch(false),
  preprocessed_text: z.string().optional().catch(undefined),
  confidence: z.number().optional().catch(undefined),
})

/** Used when the Classifier fails; the request still proceeds */
export function fallbackClassification(context: Pick<PipelineContext, 'inputText' | 'locale'>): ClassifierPayload {
  return {
    kind: 'classifier',
    inputType: 'conversation',
    language: context.locale,
    urgency: 'medium',
    emotionalContent: false,
    requiresMemorySearch: true,
    requiresTools: false,
    cleanedText: context.inputText,
  }
}

export function createClassifierStage(deps: CompletionStageDeps): Stage<'classifier'> {
  return {
    name: 'classifier',

    async run(context, signal): Promise<Result<StageResult<ClassifierPayload>, AppError>> {
      const parsed = await completeJson(
        'classifier',
        deps,
        buildClassifierPrompt(context.inputText, context.history),
        classifierSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const data = parsed.value
      const cleaned = data.preprocessed_text?.trim()
      return ok(
        emptyResult<ClassifierPayload>(
          {
            kind: 'classifier',
            inputType: data.input_type,
            language: data.language?.toLowerCase() ?? context.locale,
            urgency: data.urgency,
            emotionalContent: data.emotional_content,
            requiresMemorySearch: data.requires_memory_search,
            requiresTools: data.requires_tools,
            cleanedText: cleaned || context.inputText,
          },
          clampConfidence(data.confidence)
        )
      )
    },
  }
}
