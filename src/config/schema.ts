import { z } from 'zod'

export const decayConfigSchema = z.object({
  /** Time constant in seconds for an entry that was never reinforced (default 6h) */
  baseHalfLifeSeconds: z.number().positive().default(21_600),
  /** Time-constant multiplier per reinforcement */
  growthFactor: z.number().min(1).default(2),
})

export const shortTermConfigSchema = z
  .object({
    /** Strength strictly below this is evicted */
    evictionFloor: z.number().min(0).max(1).default(0.05),
    /** Strength at or above this is promoted */
    promotionCeiling: z.number().min(0).max(1).default(0.8),
    promotionRepeatThreshold: z.number().int().min(1).default(3),
    /** Entries younger than this (from createdAt) are never promoted */
    minPromotionAgeSeconds: z.number().min(0).default(3600),
  })
  .refine(c => c.evictionFloor < c.promotionCeiling, {
    message: 'evictionFloor must be below promotionCeiling',
  })

export const consolidationConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalHours: z.number().positive().default(24),
  interactionThreshold: z.number().int().min(1).default(100),
  /** node-cron expression for the interval check */
  checkCron: z.string().default('*/15 * * * *'),
})

export const stageTimeoutsSchema = z.object({
  classifier: z.number().positive().default(15_000),
  affect: z.number().positive().default(15_000),
  recall: z.number().positive().default(15_000),
  synthesis: z.number().positive().default(60_000),
  reward: z.number().positive().default(30_000),
  archivist: z.number().positive().default(30_000),
  toolDecider: z.number().positive().default(30_000),
})

export const pipelineConfigSchema = z.object({
  stageTimeoutMs: stageTimeoutsSchema.default({}),
  /** Upper bound on the Affect/Recall join */
  parallelJoinTimeoutMs: z.number().positive().default(20_000),
  parallelPoolSize: z.number().int().min(1).default(2),
  backgroundQueueCapacity: z.number().int().min(1).default(32),
  retryBackoffMs: z.number().min(0).default(500),
  recallShortTermLimit: z.number().int().min(0).default(10),
  longTermTopK: z.number().int().min(0).default(5),
  /** Previous exchanges passed to stages */
  historyWindow: z.number().int().min(0).default(3),
  /** Word overlap at which Recall counts a short-term entry as mentioned again */
  reinforceSimilarity: z.number().min(0).max(1).default(0.5),
  /** Affect boost at which Recall's normal writes become high importance */
  highImportanceBoost: z.number().min(0).default(2),
  defaultLocale: z.string().default('en'),
})

export const providerConfigSchema = z.object({
  baseURL: z.string().default('http://localhost:11434/v1'),
  apiKey: z.string().default('not-needed'),
  model: z.string().default('llama3.1'),
  maxTokens: z.number().int().positive().default(512),
  /** Per-stage model override, keyed by stage name */
  stageModels: z.record(z.string(), z.string()).default({}),
})

export const emotionValuesSchema = z.object({
  happiness: z.number().min(0).max(1).default(0.5),
  trust: z.number().min(0).max(1).default(0.5),
  energy: z.number().min(0).max(1).default(1),
  curiosity: z.number().min(0).max(1).default(0.5),
  frustration: z.number().min(0).max(1).default(0),
  motivation: z.number().min(0).max(1).default(0.8),
})

export const emotionConfigSchema = z.object({
  initial: emotionValuesSchema.default({}),
  /** Stage deltas arrive on a -10..10 scale and are divided by this */
  deltaScale: z.number().positive().default(100),
})

export const configSchema = z.object({
  /** Overrides COGRT_DATA_DIR / ./.cogrt-data */
  dataDir: z.string().optional(),
  decay: decayConfigSchema.default({}),
  shortTerm: shortTermConfigSchema.default({}),
  consolidation: consolidationConfigSchema.default({}),
  pipeline: pipelineConfigSchema.default({}),
  provider: providerConfigSchema.default({}),
  emotions: emotionConfigSchema.default({}),
})

export type DecayConfig = z.infer<typeof decayConfigSchema>
export type ShortTermConfig = z.infer<typeof shortTermConfigSchema>
export type ConsolidationConfig = z.infer<typeof consolidationConfigSchema>
export type StageTimeouts = z.infer<typeof stageTimeoutsSchema>
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>
export type ProviderConfig = z.infer<typeof providerConfigSchema>
export type EmotionConfig = z.infer<typeof emotionConfigSchema>
export type Config = z.infer<typeof configSchema>
