/**
 * cognitive-runtime
 *
 * Staged cognitive pipeline over a decaying short-term memory, a long-term
 * store and a bounded emotional state.
 */

export * from './pipeline/index.js'
export * from './memory/index.js'
export * from './emotion/index.js'
export * from './stages/index.js'
export * from './backend/index.js'
export * from './config/index.js'
export * from './prompts/index.js'
export { AppError, type ErrorCode, type Result, ok, err, RuntimeEventBus, setLogLevel } from './shared/index.js'
