import type { EmotionSnapshot } from './types.js'

type Band = readonly [threshold: number, phrase: string]

const MOOD_BANDS: readonly Band[] = [
  [0.7, 'cheerful and enthusiastic'],
  [0.5, 'balanced and friendly'],
  [0.3, 'a little pensive'],
]

const TRUST_BANDS: readonly Band[] = [
  [0.7, 'trusts you a lot'],
  [0.5, 'is open'],
  [0.3, 'is a bit reserved'],
]

const ENERGY_BANDS: readonly Band[] = [
  [0.7, 'full of energy'],
  [0.5, 'awake'],
  [0.3, 'a little tired'],
]

function pick(value: number, bands: readonly Band[], fallback: string): string {
  for (const [threshold, phrase] of bands) {
    if (value >= threshold) return phrase
  }
  return fallback
}

/** One-sentence mood summary for prompts and status output */
export function describeMood(snapshot: EmotionSnapshot): string {
  const mood = pick(snapshot.happiness, MOOD_BANDS, 'downcast')
  const trust = pick(snapshot.trust, TRUST_BANDS, 'is cautious')
  const energy = pick(snapshot.energy, ENERGY_BANDS, 'exhausted')
  return `The assistant is ${mood}, ${trust} and feels ${energy}.`
}
