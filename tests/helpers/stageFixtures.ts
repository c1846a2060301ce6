/**
 * Canned stage replies, contexts and config for pipeline tests
 */

import { configSchema, type Config } from '../../src/config/schema.js'
import { deepMergeConfig } from '../../src/config/loadConfig.js'
import { NEUTRAL_EMOTIONS } from '../../src/emotion/emotionalState.js'
import type { BackgroundContext, PipelineContext } from '../../src/pipeline/types.js'
import { json, type ScriptedReply } from './fakes.js'

export const INPUT = 'I just got back from a jazz concert'
export const REPLY = 'That sounds wonderful! Who was playing?'

export const classifierReply = json({
  input_type: 'emotional',
  language: 'en',
  urgency: 'low',
  emotional_content: true,
  requires_memory_search: true,
  requires_tools: false,
  preprocessed_text: INPUT,
  confidence: 0.9,
})

export const affectReply = json({
  primary_emotion: 'joy',
  emotional_intensity: 0.6,
  memory_boost_factor: 1,
  emotional_tags: ['music'],
  emotions_update: { happiness: { delta: 5, reason: 'shared a good evening' } },
  sentiment: 'positive',
  confidence: 0.8,
})

export const recallReply = json({
  search_query: 'jazz concert',
  facts: [{ content: 'User went to a jazz concert', category: 'user', importance: 'normal' }],
  confidence: 0.7,
})

export const synthesisReply = json({
  reply: REPLY,
  response_strategy: 'conversational',
  tone: 'warm',
  key_topics: ['jazz'],
  emotional_tone_adjustment: { happiness: 2 },
  confidence: 0.9,
})

export const rewardReply = json({
  satisfaction_score: 0.8,
  reward_prediction_error: 0.1,
  interaction_quality: 'good',
  motivation_delta: 3,
  reason: 'engaged reply',
})

export const archivistReply = json({
  notes: [{ section: 'user', key: 'music', value: 'likes jazz' }],
  rationale: 'user mentioned a concert',
})

export const toolDeciderReply = json({
  tool_calls: [
    { tool: 'update_preferences', data: { genre: 'jazz' }, reason: 'stated interest' },
    { tool: 'send_email', data: { to: 'someone' } },
  ],
})

/** A reply for every stage, all succeeding */
export function happyPathReplies(): Record<string, ScriptedReply> {
  return {
    classifier: classifierReply,
    affect: affectReply,
    recall: recallReply,
    synthesis: synthesisReply,
    reward: rewardReply,
    archivist: archivistReply,
    toolDecider: toolDeciderReply,
  }
}

/** Defaults with no retry backoff and consolidation off; overrides are deep-merged */
export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return configSchema.parse(
    deepMergeConfig({ pipeline: { retryBackoffMs: 0 }, consolidation: { enabled: false } }, overrides)
  )
}

export function makeContext(overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    requestId: 'req-test',
    inputText: INPUT,
    locale: 'en',
    history: [],
    emotionalSnapshot: NEUTRAL_EMOTIONS,
    personality: '',
    stageResults: {},
    ...overrides,
  }
}

export function makeBackgroundContext(overrides: Partial<BackgroundContext> = {}): BackgroundContext {
  return {
    requestId: 'req-test',
    inputText: INPUT,
    locale: 'en',
    history: [],
    emotionalSnapshot: NEUTRAL_EMOTIONS,
    personality: '',
    stageResults: {},
    reply: REPLY,
    ...overrides,
  }
}
