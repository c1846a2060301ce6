/**
 * @entry Prompts module
 *
 * Stage prompt templates
 */

export {
  buildClassifierPrompt,
  buildAffectPrompt,
  buildRecallPrompt,
  buildSynthesisPrompt,
  buildRewardPrompt,
  buildArchivistPrompt,
  buildToolDeciderPrompt,
  formatHistory,
} from './stagePrompts.js'
export type { StagePrompt, SynthesisPromptInput } from './stagePrompts.js'
