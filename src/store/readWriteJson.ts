/**
 * JSON file helpers
 *
 * Writes are atomic by default (temp file + rename) so a crash mid-write
 * never leaves a truncated record behind.
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync, appendFileSync } from 'fs'
import { dirname } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('json-io')

/**
 * Read a JSON file. Missing, unparsable or invalid files return null.
 * `validate` is the runtime shape check (usually a zod schema guard).
 */
export function readJson<T>(filepath: string, validate: (value: unknown) => value is T): T | null {
  try {
    if (!existsSync(filepath)) return null
    const parsed: unknown = JSON.parse(readFileSync(filepath, 'utf-8'))
    if (validate(parsed)) return parsed
    logger.warn(`JSON validation failed: ${filepath}`)
    return null
  } catch (e) {
    logger.debug(`Failed to read JSON: ${filepath} (${getErrorMessage(e)})`)
    return null
  }
}

/**
 * Write a JSON file, creating the parent directory. Throws on fs errors;
 * callers translate that into their own failure type.
 */
export function writeJson(filepath: string, data: unknown, options?: { atomic?: boolean }): void {
  const content = JSON.stringify(data, null, 2)
  ensureDir(dirname(filepath))

  if (options?.atomic ?? true) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

/** Append one JSON value as a line (JSON Lines) */
export function appendJsonLine(filepath: string, data: unknown): void {
  ensureDir(dirname(filepath))
  appendFileSync(filepath, `${JSON.stringify(data)}\n`, 'utf-8')
}

/** Read every parsable line of a JSON Lines file; bad lines are skipped */
export function readJsonLines<T>(filepath: string, validate: (value: unknown) => value is T): T[] {
  if (!existsSync(filepath)) return []
  const items: T[] = []
  for (const line of readFileSync(filepath, 'utf-8').split('\n')) {
    if (!line.trim()) continue
    try {
      const parsed: unknown = JSON.parse(line)
      if (validate(parsed)) items.push(parsed)
    } catch {
      logger.debug(`Skipping malformed line in ${filepath}`)
    }
  }
  return items
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
