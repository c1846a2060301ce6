/**
 * Scoped logger
 *
 * - levels debug/info/warn/error (plus silent)
 * - lines read `HH:MM:SS LVL [scope] message`
 * - logError() attaches request/stage context and the top of the stack
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

type OutputLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<OutputLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<OutputLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

let currentLevel: LogLevel = initLogLevel()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: OutputLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatTime(): string {
  const now = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`)
}

function formatMessage(level: OutputLevel, scope: string, message: string): string {
  const label = LEVEL_COLORS[level](LEVEL_LABELS[level])
  if (!scope) {
    return `${formatTime()} ${label} ${message}`
  }
  return `${formatTime()} ${label} ${chalk.cyan(`[${scope}]`)} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  /** Derive a logger with a nested scope, e.g. `stage` → `stage:recall` */
  child(subScope: string): Logger
}

export function createLogger(scope: string = ''): Logger {
  function write(level: OutputLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const output = formatMessage(level, scope, message)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      write('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      write('error', message, args)
    },
    child(subScope: string) {
      return createLogger(scope ? `${scope}:${subScope}` : subScope)
    },
  }
}

export const logger = createLogger()

// ============ Error logging ============

export interface ErrorContext {
  requestId?: string
  stage?: string
  entryId?: string
  attempt?: number
  [key: string]: unknown
}

/**
 * Log an error with its context and the first stack lines.
 *
 * @example
 * logError(log, 'Recall stage failed', error, { requestId, stage: 'recall' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: unknown,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error)
  const data: Record<string, unknown> = {}

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}
