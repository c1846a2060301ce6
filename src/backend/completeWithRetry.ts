/**
 * One bounded retry around a completion call
 *
 * rate_limited, timeout and unavailable are all retried once after a
 * backoff. Nothing is retried once the stage deadline has fired.
 */

import { err, type Result } from '../shared/result.js'
import { sleep } from '../shared/concurrency.js'
import { createLogger } from '../shared/logger.js'
import type {
  CompletionError,
  CompletionRequest,
  CompletionResult,
  TextCompletionService,
} from './types.js'

const logger = createLogger('completion')

export async function completeWithRetry(
  service: TextCompletionService,
  request: CompletionRequest,
  backoffMs: number
): Promise<Result<CompletionResult, CompletionError>> {
  const first = await service.complete(request)
  if (first.ok || request.signal?.aborted) return first

  logger.warn(`${request.stage ?? 'completion'}: ${first.error.type}, retrying in ${backoffMs}ms`)
  await sleep(backoffMs, request.signal)
  if (request.signal?.aborted) {
    return err({ type: 'timeout', message: 'Deadline expired before retry' })
  }
  return service.complete(request)
}
