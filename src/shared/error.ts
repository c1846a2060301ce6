/**
 * Unified error type
 *
 * Every expected failure in the runtime is an AppError with a closed code.
 * Callers branch on `code`, never on message text.
 */

import { getErrorMessage } from './assertError.js'

// ============ Categories ============

export type ErrorCategory =
  | 'STORAGE' // short-term medium, long-term adapter
  | 'PROVIDER' // text-completion service
  | 'STAGE' // pipeline stage execution
  | 'SCHEDULER' // background supervisor

export type ErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'WRITE_FAILED'
  | 'PROVIDER_ERROR'
  | 'STAGE_TIMEOUT'
  | 'STAGE_FAILED'
  | 'QUEUE_FULL'
  | 'SUPERVISOR_STOPPED'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }

  // ============ Factories ============

  /** Short-term medium rejected a write */
  static storageUnavailable(operation: string, cause?: unknown): AppError {
    const detail = cause === undefined ? '' : `: ${getErrorMessage(cause)}`
    return new AppError(
      'STORAGE_UNAVAILABLE',
      `Storage unavailable during ${operation}${detail}`,
      'STORAGE',
      cause
    )
  }

  static notFound(entity: string, id: string): AppError {
    return new AppError('NOT_FOUND', `${entity} not found: ${id}`, 'STORAGE')
  }

  /** Long-term adapter could not persist an entry */
  static writeFailed(id: string, cause?: unknown): AppError {
    const detail = cause === undefined ? '' : `: ${getErrorMessage(cause)}`
    return new AppError('WRITE_FAILED', `Long-term write failed for ${id}${detail}`, 'STORAGE', cause)
  }

  static provider(kind: string, message: string): AppError {
    return new AppError('PROVIDER_ERROR', `Completion ${kind}: ${message}`, 'PROVIDER')
  }

  static stageTimeout(stage: string, timeoutMs: number): AppError {
    return new AppError('STAGE_TIMEOUT', `Stage ${stage} exceeded ${timeoutMs}ms`, 'STAGE')
  }

  static stageFailed(stage: string, reason: string, cause?: unknown): AppError {
    return new AppError('STAGE_FAILED', `Stage ${stage} failed: ${reason}`, 'STAGE', cause)
  }

  static queueFull(capacity: number): AppError {
    return new AppError('QUEUE_FULL', `Background queue is full (${capacity})`, 'SCHEDULER')
  }

  static supervisorStopped(label: string): AppError {
    return new AppError('SUPERVISOR_STOPPED', `Background supervisor stopped, rejected ${label}`, 'SCHEDULER')
  }
}

/** Exhaustiveness check for discriminated unions */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`)
}
