/**
 * OpenAI-compatible completion service
 *
 * Uses the openai SDK against any OpenAI-compatible endpoint (Ollama, LM Studio,
 * vLLM, hosted APIs). One chat completion per call; no session state.
 */

import OpenAI from 'openai'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { ProviderConfig } from '../config/schema.js'
import type {
  CompletionError,
  CompletionRequest,
  CompletionResult,
  TextCompletionService,
} from './types.js'

const logger = createLogger('completion')

export interface OpenAICompletionOptions {
  /** Client-side request timeout; stage deadlines abort earlier through the signal */
  timeoutMs?: number
  /** Injected client, for tests */
  client?: OpenAI
}

export function resolveModel(config: ProviderConfig, stage?: string): string {
  return (stage && config.stageModels[stage]) || config.model
}

/** Map an SDK or transport failure onto the three provider error kinds */
export function toCompletionError(error: unknown, signal?: AbortSignal): CompletionError {
  const message = getErrorMessage(error)

  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return { type: 'timeout', message: 'Aborted by stage deadline' }
  }
  if (error instanceof OpenAI.RateLimitError) {
    return { type: 'rate_limited', message }
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { type: 'timeout', message }
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return { type: 'unavailable', message: `Connection failed: ${message}` }
  }
  if (error instanceof OpenAI.APIError) {
    return { type: 'unavailable', message: `API error (${error.status ?? 'unknown'}): ${message}` }
  }
  if (message.includes('timeout') || message.includes('ETIMEDOUT')) {
    return { type: 'timeout', message }
  }
  return { type: 'unavailable', message }
}

export function createOpenAICompletionService(
  config: ProviderConfig,
  options: OpenAICompletionOptions = {}
): TextCompletionService {
  const client =
    options.client ??
    new OpenAI({
      baseURL: config.baseURL,
      apiKey: config.apiKey || 'no-key',
      timeout: options.timeoutMs ?? 120_000,
      // Retries belong to the stage, not the SDK
      maxRetries: 0,
    })

  return {
    name: 'openai-compatible',

    async complete(request: CompletionRequest): Promise<Result<CompletionResult, CompletionError>> {
      const model = resolveModel(config, request.stage)
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = []
      if (request.system) {
        messages.push({ role: 'system', content: request.system })
      }
      messages.push({ role: 'user', content: request.prompt })

      const startTime = Date.now()
      try {
        const completion = await client.chat.completions.create(
          { model, messages, max_tokens: request.maxTokens },
          request.signal ? { signal: request.signal } : undefined
        )
        const text = completion.choices[0]?.message?.content ?? ''
        const durationMs = Date.now() - startTime
        logger.debug(`${request.stage ?? 'completion'} done (${(durationMs / 1000).toFixed(1)}s, model: ${model})`)
        return ok({ text, model, durationMs })
      } catch (error: unknown) {
        const mapped = toCompletionError(error, request.signal)
        logger.debug(`${request.stage ?? 'completion'} failed: ${mapped.type} (${mapped.message})`)
        return err(mapped)
      }
    },
  }
}
