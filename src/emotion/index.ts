/**
 * @entry Emotion module
 */

export { EmotionalState, DeltaBatch, NEUTRAL_EMOTIONS, clampUnit } from './emotionalState.js'
export type { EmotionalStateOptions } from './emotionalState.js'
export { describeMood } from './describeMood.js'
export { EMOTION_DIMENSIONS, isEmotionDimension } from './types.js'
export type { EmotionDimension, EmotionSnapshot, EmotionDelta } from './types.js'
