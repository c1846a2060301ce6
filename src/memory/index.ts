/**
 * @entry Memory module
 *
 * Decay model, short-term tier, long-term adapter, consolidation, personality notes
 */

export { calculateStrength, strengthAt, secondsUntilStrength, DEFAULT_DECAY_PARAMS } from './decayModel.js'
export type { DecayParams } from './decayModel.js'
export {
  ShortTermStore,
  createFilePersistence,
  createInMemoryPersistence,
  DEFAULT_SHORT_TERM_THRESHOLDS,
} from './shortTermStore.js'
export type {
  ShortTermPersistence,
  ShortTermThresholds,
  ShortTermStoreOptions,
  ListActiveOptions,
  PutToLongTerm,
} from './shortTermStore.js'
export { FileLongTermStore, rankEntries, scoreRelevance } from './longTermStore.js'
export type { LongTermStoreAdapter } from './longTermStore.js'
export { ConsolidationWorker } from './consolidationWorker.js'
export type {
  ConsolidationPhase,
  ConsolidationSettings,
  ConsolidationStatus,
  ConsolidationWorkerOptions,
} from './consolidationWorker.js'
export { PersonalityNotesStore } from './personalityNotes.js'
export type { NoteInput } from './personalityNotes.js'
export { contentSimilarity, queryCoverage, tokenize } from './contentSimilarity.js'
export * from './types.js'
