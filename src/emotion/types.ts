/**
 * Emotional state types
 */

export const EMOTION_DIMENSIONS = [
  'happiness',
  'trust',
  'energy',
  'curiosity',
  'frustration',
  'motivation',
] as const

export type EmotionDimension = (typeof EMOTION_DIMENSIONS)[number]

/** Every dimension in [0, 1] */
export type EmotionSnapshot = Readonly<Record<EmotionDimension, number>>

export interface EmotionDelta {
  dimension: EmotionDimension
  delta: number
  /** Observability only, never read by control flow */
  reason: string
  source: string
}

export function isEmotionDimension(value: string): value is EmotionDimension {
  return EMOTION_DIMENSIONS.some(d => d === value)
}
