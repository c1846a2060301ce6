/**
 * Runtime lifecycle events — lets surfaces and diagnostics observe the
 * pipeline without the pipeline knowing about them.
 *
 * Listener errors are caught and logged, never propagated to the emitter.
 */

import { EventEmitter } from 'events'
import { createLogger } from '../logger.js'
import { getErrorMessage } from '../assertError.js'
import type { PipelineState } from '../../pipeline/types.js'
import type { ConsolidationRecord } from '../../memory/types.js'

const logger = createLogger('runtime-events')

export interface RequestStatePayload {
  requestId: string
  state: PipelineState
  at: string
}

export interface RequestDonePayload {
  requestId: string
  /** Background stages that failed or timed out */
  failedStages: string[]
  durationMs: number
}

export interface RuntimeEventMap {
  'request:state': [payload: RequestStatePayload]
  'request:done': [payload: RequestDonePayload]
  'consolidation:completed': [record: ConsolidationRecord]
}

/**
 * Event bus with error-isolated listeners.
 * A failing listener neither crashes the emitter nor blocks other listeners.
 */
export class RuntimeEventBus extends EventEmitter<RuntimeEventMap> {
  emit<K extends keyof RuntimeEventMap>(event: K, ...args: RuntimeEventMap[K]): boolean {
    const listeners = this.listeners(event)
    for (const listener of listeners) {
      try {
        const result: unknown = Reflect.apply(listener, this, args)
        if (result instanceof Promise) {
          result.catch((e: unknown) => {
            logger.error(`Async listener error for ${String(event)}: ${getErrorMessage(e)}`)
          })
        }
      } catch (e) {
        logger.error(`Listener error for ${String(event)}: ${getErrorMessage(e)}`)
      }
    }
    return listeners.length > 0
  }
}
