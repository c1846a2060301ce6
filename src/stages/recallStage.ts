/**
 * Recall — builds a search query, gathers short-term and long-term candidates,
 * and proposes new facts to remember
 *
 * Reads only. Reinforcements and writes go back to the orchestrator as
 * requests in the result.
 */

import { z } from 'zod'
import { ok, err, type Result } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { MEMORY_CATEGORIES, MEMORY_IMPORTANCE, type MemoryWriteRequest, type RankedMemory } from '../memory/types.js'
import { contentSimilarity } from '../memory/contentSimilarity.js'
import { scoreRelevance } from '../memory/longTermStore.js'
import type { ShortTermStore } from '../memory/shortTermStore.js'
import type { LongTermStoreAdapter } from '../memory/longTermStore.js'
import { buildRecallPrompt } from '../prompts/stagePrompts.js'
import { clampConfidence, completeJson, type CompletionStageDeps } from './completeJson.js'
import type { RecallPayload, Stage, StageResult } from './types.js'

const logger = createLogger('stage:recall')

export interface RecallStageDeps extends CompletionStageDeps {
  shortTerm: Pick<ShortTermStore, 'listActive'>
  longTerm: LongTermStoreAdapter
  shortTermLimit: number
  longTermTopK: number
  /** Word overlap with the input at which an entry counts as mentioned again */
  reinforceSimilarity: number
}

const factSchema = z.object({
  content: z.string().trim().min(1),
  category: z.enum(MEMORY_CATEGORIES).catch('chat'),
  importance: z.enum(MEMORY_IMPORTANCE).catch('normal'),
})

const recallSchema = z.object({
  search_query: z.string().optional().catch(undefined),
  facts: z
    .array(z.unknown())
    .catch([])
    .transform(items =>
      items.flatMap(item => {
        const parsed = factSchema.safeParse(item)
        return parsed.success ? [parsed.data] : []
      })
    ),
  confidence: z.number().optional().catch(undefined),
})

/** A throwing adapter counts as an unavailable long-term tier */
async function queryLongTerm(
  adapter: LongTermStoreAdapter,
  text: string,
  k: number
): Promise<Result<RankedMemory[], AppError>> {
  try {
    return await adapter.query(text, k)
  } catch (error) {
    return err(AppError.storageUnavailable('long-term query', error))
  }
}

export function createRecallStage(deps: RecallStageDeps): Stage<'recall'> {
  return {
    name: 'recall',

    async run(context, signal): Promise<Result<StageResult<RecallPayload>, AppError>> {
      const classification = context.stageResults.classifier?.payload
      const parsed = await completeJson(
        'recall',
        deps,
        buildRecallPrompt(context.inputText, classification),
        recallSchema,
        signal
      )
      if (!parsed.ok) return parsed

      const data = parsed.value
      const query = data.search_query?.trim() || classification?.cleanedText || context.inputText

      const active = deps.shortTerm.listActive()
      const reinforcements = active
        .filter(e => contentSimilarity(context.inputText, e.content) >= deps.reinforceSimilarity)
        .map(e => e.id)

      const shortTerm = active
        .map(entry => ({ entry, relevance: scoreRelevance(query, entry.content) }))
        .filter(r => r.relevance > 0)
        .sort((a, b) => b.relevance - a.relevance || b.entry.strength - a.entry.strength)
        .slice(0, deps.shortTermLimit)
        .map(r => r.entry)

      let longTerm: RankedMemory[] = []
      if (deps.longTermTopK > 0 && classification?.requiresMemorySearch !== false) {
        const queried = await queryLongTerm(deps.longTerm, query, deps.longTermTopK)
        if (queried.ok) {
          longTerm = queried.value
        } else {
          logger.warn(`Long-term query failed, continuing without: ${queried.error.message}`)
        }
      }

      const memoryWrites: MemoryWriteRequest[] = data.facts.map(f => ({
        content: f.content,
        category: f.category,
        importance: f.importance,
      }))

      return ok({
        payload: { kind: 'recall', query, shortTerm, longTerm },
        memoryWrites,
        reinforcements,
        emotionDeltas: [],
        confidence: clampConfidence(data.confidence),
      })
    },
  }
}
