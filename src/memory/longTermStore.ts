/**
 * Long-term memory tier
 *
 * The runtime only sees `LongTermStoreAdapter`; the similarity engine behind it
 * is pluggable. `FileLongTermStore` is the in-process default: one JSON file
 * per entry, ranked by word overlap.
 */

import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger } from '../shared/logger.js'
import { FileStore } from '../store/GenericFileStore.js'
import { isMemoryEntry } from '../store/schemas.js'
import { contentSimilarity, queryCoverage } from './contentSimilarity.js'
import type { MemoryEntry, RankedMemory } from './types.js'

const logger = createLogger('long-term')

export interface LongTermStoreAdapter {
  /** Fails with WRITE_FAILED; never drops an entry silently */
  put(entry: MemoryEntry): Promise<Result<void, AppError>>
  /** Up to k entries, most relevant first */
  query(text: string, k: number): Promise<Result<RankedMemory[], AppError>>
}

/** Relevance of a stored entry to a query, 0..1 */
export function scoreRelevance(query: string, content: string): number {
  return Math.max(contentSimilarity(query, content), queryCoverage(query, content) * 0.9)
}

export function rankEntries(entries: Iterable<MemoryEntry>, text: string, k: number): RankedMemory[] {
  if (k <= 0) return []
  const ranked: RankedMemory[] = []
  for (const entry of entries) {
    const relevance = scoreRelevance(text, entry.content)
    if (relevance > 0) ranked.push({ entry, relevance })
  }
  return ranked.sort((a, b) => b.relevance - a.relevance).slice(0, k)
}

export class FileLongTermStore implements LongTermStoreAdapter {
  private readonly store: FileStore<MemoryEntry>

  constructor(dir: string) {
    this.store = new FileStore<MemoryEntry>({ dir, validate: isMemoryEntry })
  }

  async put(entry: MemoryEntry): Promise<Result<void, AppError>> {
    try {
      await this.store.set(entry.id, entry)
      logger.debug(`Stored ${entry.id}`)
      return ok(undefined)
    } catch (error) {
      return err(AppError.writeFailed(entry.id, error))
    }
  }

  async query(text: string, k: number): Promise<Result<RankedMemory[], AppError>> {
    try {
      return ok(rankEntries(this.store.getAllSync(), text, k))
    } catch (error) {
      return err(AppError.storageUnavailable('long-term query', error))
    }
  }

  count(): number {
    return this.store.listSync().length
  }
}
