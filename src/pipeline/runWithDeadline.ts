/**
 * Run a stage under a deadline
 *
 * On expiry the stage's signal is aborted and the call resolves with
 * STAGE_TIMEOUT right away; a result that arrives later is discarded.
 * A parent signal (the parallel join) ends the stage the same way.
 */

import { AppError } from '../shared/error.js'
import { err, type Result } from '../shared/result.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('deadline')

export function runWithDeadline<T>(
  stage: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<Result<T, AppError>>,
  parentSignal?: AbortSignal
): Promise<Result<T, AppError>> {
  const controller = new AbortController()

  return new Promise(resolve => {
    let settled = false

    const expire = () => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      parentSignal?.removeEventListener('abort', expire)
      controller.abort()
      resolve(err(AppError.stageTimeout(stage, timeoutMs)))
    }

    const timer = setTimeout(expire, timeoutMs)
    if (parentSignal?.aborted) {
      expire()
      return
    }
    parentSignal?.addEventListener('abort', expire, { once: true })

    const finish = (result: Result<T, AppError>) => {
      if (settled) {
        logger.debug(`Discarding late result from ${stage}`)
        return
      }
      settled = true
      clearTimeout(timer)
      parentSignal?.removeEventListener('abort', expire)
      resolve(result)
    }

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(finish, (error: unknown) => {
        finish(err(AppError.stageFailed(stage, getErrorMessage(error), error)))
      })
  })
}
