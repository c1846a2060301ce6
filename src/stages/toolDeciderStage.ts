/**
 * ToolDecider — background choice of bookkeeping commands
 *
 * Commands are resolved here and applied by the orchestrator.
 */

import { z } from 'zod'
import { ok, type Result } from '../shared/result.js'
import type { AppError } from '../shared/error.js'
import type { BackgroundContext } from '../pipeline/types.js'
import { buildToolDeciderPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, type CompletionStageDeps } from './completeJson.js'
import { parseToolCommands } from './toolCommands.js'
import { emptyResult, type Stage, type StageResult, type ToolDeciderPayload } from './types.js'

const toolDeciderSchema = z.object({
  tool_calls: z.array(z.unknown()).catch([]),
  confidence: z.number().optional().catch(undefined),
})

export function createToolDeciderStage(deps: CompletionStageDeps): Stage<'toolDecider', BackgroundContext> {
  return {
    name: 'toolDecider',

    async run(context, signal): Promise<Result<StageResult<ToolDeciderPayload>, AppError>> {
      const parsed = await completeJson(
        'toolDecider',
        deps,
        buildToolDeciderPrompt(context.inputText, context.reply),
        toolDeciderSchema,
        signal
      )
      if (!parsed.ok) return parsed

      return ok(
        emptyResult<ToolDeciderPayload>(
          { kind: 'toolDecider', commands: parseToolCommands(parsed.value.tool_calls) },
          clampConfidence(parsed.value.confidence)
        )
      )
    },
  }
}
