/**
 * @entry Store module
 *
 * JSON file persistence under the data directory
 */

export { FileStore } from './GenericFileStore.js'
export type { FileStoreOptions } from './GenericFileStore.js'
export { readJson, writeJson, appendJsonLine, readJsonLines, ensureDir } from './readWriteJson.js'
export { getDataDir, resolveDataPaths, FILE_NAMES } from './paths.js'
export type { DataPaths } from './paths.js'
export {
  guardOf,
  isMemoryEntry,
  isConsolidationRecord,
  isConsolidationState,
  isEmotionSnapshot,
  isPersonalityNotes,
} from './schemas.js'
export type { ConsolidationState } from './schemas.js'
