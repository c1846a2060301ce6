/**
 * @entry Backend module
 *
 * Text-completion service contract and the OpenAI-compatible implementation
 */

export { createOpenAICompletionService, toCompletionError, resolveModel } from './openaiCompletionService.js'
export type { OpenAICompletionOptions } from './openaiCompletionService.js'
export { completeWithRetry } from './completeWithRetry.js'
export type {
  CompletionRequest,
  CompletionResult,
  CompletionError,
  CompletionErrorType,
  TextCompletionService,
} from './types.js'
