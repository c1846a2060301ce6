/**
 * @entry Stages module
 *
 * The seven pipeline stages and their wiring
 */

import { createClassifierStage } from './classifierStage.js'
import { createAffectStage } from './affectStage.js'
import { createRecallStage, type RecallStageDeps } from './recallStage.js'
import { createSynthesisStage } from './synthesisStage.js'
import { createRewardStage } from './rewardStage.js'
import { createArchivistStage } from './archivistStage.js'
import { createToolDeciderStage } from './toolDeciderStage.js'
import type { BackgroundStages, ForegroundStages } from './types.js'

export interface DefaultStageDeps extends RecallStageDeps {
  deltaScale: number
}

export function createDefaultStages(deps: DefaultStageDeps): {
  foreground: ForegroundStages
  background: BackgroundStages
} {
  return {
    foreground: {
      classifier: createClassifierStage(deps),
      affect: createAffectStage(deps),
      recall: createRecallStage(deps),
      synthesis: createSynthesisStage(deps),
    },
    background: {
      reward: createRewardStage(deps),
      archivist: createArchivistStage(deps),
      toolDecider: createToolDeciderStage(deps),
    },
  }
}

export { createClassifierStage, fallbackClassification } from './classifierStage.js'
export { createAffectStage } from './affectStage.js'
export type { AffectStageDeps } from './affectStage.js'
export { createRecallStage } from './recallStage.js'
export type { RecallStageDeps } from './recallStage.js'
export { createSynthesisStage } from './synthesisStage.js'
export { createRewardStage } from './rewardStage.js'
export { createArchivistStage } from './archivistStage.js'
export { createToolDeciderStage } from './toolDeciderStage.js'
export { parseStageJson, completeJson, clampConfidence, scaleDelta } from './completeJson.js'
export type { CompletionStageDeps } from './completeJson.js'
export { parseToolCommands, toolCommandSchema } from './toolCommands.js'
export type { ToolCommand, ToolName } from './toolCommands.js'
export * from './types.js'
