/**
 * Decay model — exponential forgetting with spaced-repetition stretch
 *
 * strength = e^(-age / (baseHalfLife * growthFactor^reinforcementCount))
 *
 * Every reinforcement multiplies the effective time constant by growthFactor,
 * so a memory that keeps coming up fades more slowly each time.
 */

export interface DecayParams {
  /** Time constant in seconds for a never-reinforced entry */
  baseHalfLifeSeconds: number
  /** Time-constant multiplier per reinforcement, >= 1 */
  growthFactor: number
}

export const DEFAULT_DECAY_PARAMS: DecayParams = {
  baseHalfLifeSeconds: 6 * 3600,
  growthFactor: 2,
}

/**
 * Pure and total: never throws, always returns a value in [0, 1].
 * Negative or NaN age counts as 0, infinite age decays fully; negative counts as 0.
 */
export function calculateStrength(
  ageSeconds: number,
  reinforcementCount: number,
  params: DecayParams = DEFAULT_DECAY_PARAMS
): number {
  if (ageSeconds === Number.POSITIVE_INFINITY) return 0
  const age = Number.isFinite(ageSeconds) && ageSeconds > 0 ? ageSeconds : 0
  if (age === 0) return 1

  const count = Number.isFinite(reinforcementCount) && reinforcementCount > 0 ? Math.floor(reinforcementCount) : 0
  const base = params.baseHalfLifeSeconds > 0 ? params.baseHalfLifeSeconds : DEFAULT_DECAY_PARAMS.baseHalfLifeSeconds
  const growth = params.growthFactor >= 1 ? params.growthFactor : 1

  const timeConstant = base * Math.pow(growth, count)
  if (!Number.isFinite(timeConstant)) return 1

  const strength = Math.exp(-age / timeConstant)
  return Math.min(1, Math.max(0, strength))
}

/** Strength of an entry at `nowMs`, from its last reinforcement */
export function strengthAt(
  entry: { lastReinforcedAt: string; reinforcementCount: number },
  nowMs: number,
  params: DecayParams = DEFAULT_DECAY_PARAMS
): number {
  const ageSeconds = (nowMs - Date.parse(entry.lastReinforcedAt)) / 1000
  return calculateStrength(ageSeconds, entry.reinforcementCount, params)
}

/**
 * Seconds from the last reinforcement until strength drops to `threshold`.
 * From e^(-t/S) = threshold → t = -S * ln(threshold).
 */
export function secondsUntilStrength(
  threshold: number,
  reinforcementCount: number,
  params: DecayParams = DEFAULT_DECAY_PARAMS
): number {
  if (threshold >= 1) return 0
  if (threshold <= 0) return Number.POSITIVE_INFINITY
  const timeConstant = params.baseHalfLifeSeconds * Math.pow(params.growthFactor, Math.max(0, reinforcementCount))
  return -timeConstant * Math.log(threshold)
}
