/**
 * Generic one-file-per-entity JSON store
 *
 * Each entity lives in `<dir>/<id>.json`. Reads validate the shape and skip
 * files that fail; writes throw on fs errors so callers can map them to
 * their own failure types.
 *
 * @example
 * ```ts
 * const store = new FileStore<MemoryEntry>({ dir: 'data/short-term', validate: isMemoryEntry })
 * await store.set(entry.id, entry)
 * store.getAllSync()
 * ```
 */

import { existsSync, readdirSync } from 'fs'
import { unlink } from 'fs/promises'
import { join, basename } from 'path'
import { readJson, writeJson, ensureDir } from './readWriteJson.js'

export interface FileStoreOptions<T> {
  dir: string
  validate: (value: unknown) => value is T
  /** File extension, default .json */
  ext?: string
}

const SAFE_ID = /^[A-Za-z0-9_-]+$/

export class FileStore<T> {
  private dir: string
  private ext: string
  private validate: (value: unknown) => value is T

  constructor(options: FileStoreOptions<T>) {
    this.dir = options.dir
    this.ext = options.ext ?? '.json'
    this.validate = options.validate
    ensureDir(this.dir)
  }

  private getPath(id: string): string {
    if (!SAFE_ID.test(id)) {
      throw new Error(`Invalid entity id: ${id}`)
    }
    return join(this.dir, `${id}${this.ext}`)
  }

  listSync(): string[] {
    if (!existsSync(this.dir)) return []
    return readdirSync(this.dir)
      .filter(f => f.endsWith(this.ext))
      .map(f => basename(f, this.ext))
  }

  getSync(id: string): T | null {
    return readJson(this.getPath(id), this.validate)
  }

  getAllSync(): T[] {
    const items: T[] = []
    for (const id of this.listSync()) {
      const item = this.getSync(id)
      if (item) items.push(item)
    }
    return items
  }

  async set(id: string, data: T): Promise<void> {
    writeJson(this.getPath(id), data)
  }

  /** Resolves false when the file was already gone */
  async delete(id: string): Promise<boolean> {
    const path = this.getPath(id)
    if (!existsSync(path)) return false
    await unlink(path)
    return true
  }
}
