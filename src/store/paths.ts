/**
 * Storage path constants
 *
 * Data directory priority:
 * 1. COGRT_DATA_DIR environment variable (relative paths resolve against cwd)
 * 2. ./.cogrt-data
 *
 * Paths are resolved per call so tests can point COGRT_DATA_DIR at a temp dir.
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.cogrt-data'

export function getDataDir(): string {
  const envDir = process.env.COGRT_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

export const FILE_NAMES = {
  SHORT_TERM_DIR: 'short-term',
  LONG_TERM_DIR: 'long-term',
  CONSOLIDATION_LOG: 'consolidation.jsonl',
  CONSOLIDATION_STATE: 'consolidation-state.json',
  EMOTIONS: 'emotions.json',
  PERSONALITY: 'personality.json',
} as const

export interface DataPaths {
  root: string
  shortTermDir: string
  longTermDir: string
  consolidationLog: string
  consolidationState: string
  emotions: string
  personality: string
}

export function resolveDataPaths(root: string = getDataDir()): DataPaths {
  return {
    root,
    shortTermDir: join(root, FILE_NAMES.SHORT_TERM_DIR),
    longTermDir: join(root, FILE_NAMES.LONG_TERM_DIR),
    consolidationLog: join(root, FILE_NAMES.CONSOLIDATION_LOG),
    consolidationState: join(root, FILE_NAMES.CONSOLIDATION_STATE),
    emotions: join(root, FILE_NAMES.EMOTIONS),
    personality: join(root, FILE_NAMES.PERSONALITY),
  }
}
