/**
 * @entry Shared infrastructure
 *
 * Low-level helpers with no runtime logic of their own:
 * - Result<T,E> and AppError for expected failures
 * - scoped chalk logger with logError()
 * - ids, slot pool, keyed mutex, abortable sleep
 * - runtime event bus
 */

export { type Result, ok, err } from './result.js'

export { type ErrorCode, type ErrorCategory, AppError, assertNever } from './error.js'

export {
  type LogLevel,
  type Logger,
  type ErrorContext,
  createLogger,
  setLogLevel,
  logError,
  logger,
} from './logger.js'

export { generateId, generateRequestId } from './generateId.js'

export { getErrorMessage } from './assertError.js'

export {
  type SlotPool,
  type KeyedMutex,
  createSlotPool,
  createKeyedMutex,
  sleep,
  deepFreeze,
} from './concurrency.js'

export {
  RuntimeEventBus,
  type RuntimeEventMap,
  type RequestStatePayload,
  type RequestDonePayload,
} from './events/runtimeEvents.js'
