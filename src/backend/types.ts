/**
 * Text-completion service contract
 *
 * Every stage talks to generation through TextCompletionService. Failures
 * are values, never throws.
 */

import type { Result } from '../shared/result.js'

export interface CompletionRequest {
  prompt: string
  maxTokens: number
  /** System message, when the stage has one */
  system?: string
  /** Stage name; selects a per-stage model override */
  stage?: string
  /** Aborted when the stage deadline expires */
  signal?: AbortSignal
}

export interface CompletionResult {
  text: string
  model: string
  durationMs: number
}

export type CompletionErrorType = 'rate_limited' | 'timeout' | 'unavailable'

export interface CompletionError {
  type: CompletionErrorType
  message: string
}

export interface TextCompletionService {
  readonly name: string
  complete(request: CompletionRequest): Promise<Result<CompletionResult, CompletionError>>
}
