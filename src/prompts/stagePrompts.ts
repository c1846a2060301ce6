/**
 * Stage prompt templates
 *
 * Each builder returns a system + user pair. Every stage answers with a
 * single JSON object; the field lists here match the stage schemas.
 */

import { describeMood } from '../emotion/describeMood.js'
import type { EmotionSnapshot } from '../emotion/types.js'
import type { MemoryEntry, RankedMemory } from '../memory/types.js'
import type { HistoryTurn } from '../pipeline/types.js'
import type { AffectPayload, ClassifierPayload } from '../stages/types.js'

export interface StagePrompt {
  system: string
  user: string
}

const JSON_ONLY = 'Reply with a single JSON object and nothing else.'

export function formatHistory(history: readonly HistoryTurn[], maxTurns: number = 3): string {
  if (history.length === 0) return '(no previous messages)'
  return history
    .slice(-maxTurns)
    .map(turn => `User: ${turn.user}\nAssistant: ${turn.assistant}`)
    .join('\n')
}

function formatEmotions(emotions: EmotionSnapshot): string {
  return Object.entries(emotions)
    .map(([dimension, value]) => `${dimension}=${Math.round(value * 100)}`)
    .join(', ')
}

function formatMemories(shortTerm: readonly MemoryEntry[], longTerm: readonly RankedMemory[]): string {
  const lines = [
    ...shortTerm.slice(0, 5).map(e => `- (recent) ${e.content.slice(0, 160)}`),
    ...longTerm.slice(0, 5).map(r => `- (long-term) ${r.entry.content.slice(0, 160)}`),
  ]
  return lines.length > 0 ? lines.join('\n') : '(no relevant memories)'
}

export function buildClassifierPrompt(input: string, history: readonly HistoryTurn[]): StagePrompt {
  return {
    system: `You classify a user's message for a conversational assistant. ${JSON_ONLY}
{
  "input_type": "conversation|information|emotional|task|memory_query|urgent",
  "language": "ISO 639-1 code",
  "urgency": "low|medium|high",
  "emotional_content": true|false,
  "requires_memory_search": true|false,
  "requires_tools": true|false,
  "preprocessed_text": "the message with noise removed",
  "confidence": 0.0-1.0
}`,
    user: `Recent conversation:\n${formatHistory(history)}\n\nMessage: ${input}`,
  }
}

export function buildAffectPrompt(
  input: string,
  emotions: EmotionSnapshot,
  classification: ClassifierPayload | undefined
): StagePrompt {
  return {
    system: `You judge how a message should move the assistant's emotional state. ${JSON_ONLY}
Deltas are integers from -10 to 10.
{
  "primary_emotion": "joy|sadness|anger|fear|surprise|neutral",
  "emotional_intensity": 0.0-1.0,
  "memory_boost_factor": 1.0-3.0,
  "emotional_tags": ["tag"],
  "emotions_update": {
    "happiness": {"delta": 0, "reason": "why"},
    "trust": {"delta": 0, "reason": "why"},
    "energy": {"delta": 0, "reason": "why"},
    "curiosity": {"delta": 0, "reason": "why"},
    "frustration": {"delta": 0, "reason": "why"},
    "motivation": {"delta": 0, "reason": "why"}
  },
  "sentiment": "positive|negative|neutral",
  "confidence": 0.0-1.0
}`,
    user: [
      `Current emotions (0-100): ${formatEmotions(emotions)}`,
      classification ? `Input type: ${classification.inputType}, urgency: ${classification.urgency}` : '',
      `Message: ${input}`,
    ]
      .filter(Boolean)
      .join('\n'),
  }
}

export function buildRecallPrompt(input: string, classification: ClassifierPayload | undefined): StagePrompt {
  return {
    system: `You decide what to look up in memory and which new facts are worth remembering. ${JSON_ONLY}
{
  "search_query": "short keyword query",
  "facts": [{"content": "fact to remember", "category": "user|system|context|chat|dream", "importance": "low|normal|high"}],
  "confidence": 0.0-1.0
}
Only list facts that will still matter later. Return an empty list when nothing is worth keeping.`,
    user: [
      classification ? `Input type: ${classification.inputType}` : '',
      `Message: ${classification?.cleanedText ?? input}`,
    ]
      .filter(Boolean)
      .join('\n'),
  }
}

export interface SynthesisPromptInput {
  input: string
  history: readonly HistoryTurn[]
  emotions: EmotionSnapshot
  personality: string
  classification: ClassifierPayload
  affect: AffectPayload | undefined
  shortTerm: readonly MemoryEntry[]
  longTerm: readonly RankedMemory[]
}

export function buildSynthesisPrompt(p: SynthesisPromptInput): StagePrompt {
  const affectLine = p.affect
    ? `Emotional read: ${p.affect.primaryEmotion} (intensity ${p.affect.intensity.toFixed(2)}, ${p.affect.sentiment})`
    : 'Emotional read: unavailable'

  return {
    system: `You are a warm, curious conversational assistant with your own evolving mood.
${describeMood(p.emotions)}
${p.personality ? `What you know about yourself and the user:\n${p.personality}\n` : ''}
Write the reply to the user and describe how you chose it. ${JSON_ONLY}
{
  "reply": "the message to send",
  "response_strategy": "conversational|informative|emotional|technical|creative",
  "tone": "friendly|formal|casual|enthusiastic|calm",
  "key_topics": ["topic"],
  "emotional_tone_adjustment": {"happiness": 0, "trust": 0},
  "confidence": 0.0-1.0
}
Adjustments are integers from -10 to 10.`,
    user: `Recent conversation:
${formatHistory(p.history)}

Input type: ${p.classification.inputType}, urgency: ${p.classification.urgency}, language: ${p.classification.language}
${affectLine}

Memories:
${formatMemories(p.shortTerm, p.longTerm)}

Message: ${p.input}`,
  }
}

export function buildRewardPrompt(input: string, reply: string, emotions: EmotionSnapshot): StagePrompt {
  return {
    system: `You rate how well an exchange went, as a reward signal. ${JSON_ONLY}
{
  "satisfaction_score": 0.0-1.0,
  "reward_prediction_error": -1.0-1.0,
  "interaction_quality": "excellent|good|neutral|poor|bad",
  "motivation_delta": -10-10,
  "reason": "short explanation",
  "confidence": 0.0-1.0
}`,
    user: `Emotions (0-100): ${formatEmotions(emotions)}\nUser: ${input}\nAssistant: ${reply}`,
  }
}

export function buildArchivistPrompt(input: string, reply: string, personality: string): StagePrompt {
  return {
    system: `You maintain the assistant's notes about itself (soul), the user (user) and the user's preferences (preferences). ${JSON_ONLY}
{
  "notes": [{"section": "soul|user|preferences", "key": "short label", "value": "the note"}],
  "rationale": "why",
  "confidence": 0.0-1.0
}
Only add notes that are new. Return an empty list when nothing changed.`,
    user: `Current notes:\n${personality || '(none)'}\n\nUser: ${input}\nAssistant: ${reply}`,
  }
}

export function buildToolDeciderPrompt(input: string, reply: string): StagePrompt {
  return {
    system: `You decide which bookkeeping tools to call after an exchange. ${JSON_ONLY}
{
  "tool_calls": [
    {"tool": "update_user_profile|update_soul|update_preferences", "data": {"key": "value"}, "reason": "why"},
    {"tool": "add_short_term_memory", "content": "fact", "category": "user|system|context|chat|dream", "importance": "low|normal|high", "reason": "why"}
  ],
  "confidence": 0.0-1.0
}
Return an empty list when no tool is needed.`,
    user: `User: ${input}\nAssistant: ${reply}`,
  }
}
