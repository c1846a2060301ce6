import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.cognitive-runtime.yaml'

let cachedConfig: Config | null = null

/**
 * Locate config files (global + project).
 * The global file is the base, the project file overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Same directory as home: load once
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load runtime config.
 * Order: ~/.cognitive-runtime.yaml → ./.cognitive-runtime.yaml → defaults, then env overrides.
 */
export async function loadConfig(options?: { cwd?: string }): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options?.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a YAML file; empty, comment-only or unreadable files count as {}
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  try {
    const parsed: unknown = YAML.parse(await readFile(filePath, 'utf-8'))
    return isPlainObject(parsed) ? parsed : {}
  } catch (error) {
    logger.warn(`Failed to parse ${filePath}: ${getErrorMessage(error)}`)
    return {}
  }
}

/**
 * Merge config objects: project fields override global fields.
 * Nested objects merge recursively, arrays are replaced.
 */
export function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * Apply environment variable overrides.
 * Runs after schema validation, so env values skip schema checks.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.COGRT_PROVIDER_BASE_URL || env.COGRT_PROVIDER_API_KEY || env.COGRT_PROVIDER_MODEL) {
    const provider = { ...config.provider }
    if (env.COGRT_PROVIDER_BASE_URL) provider.baseURL = env.COGRT_PROVIDER_BASE_URL
    if (env.COGRT_PROVIDER_API_KEY) provider.apiKey = env.COGRT_PROVIDER_API_KEY
    if (env.COGRT_PROVIDER_MODEL) provider.model = env.COGRT_PROVIDER_MODEL
    config = { ...config, provider }
  }

  if (env.COGRT_DATA_DIR) {
    config = { ...config, dataDir: env.COGRT_DATA_DIR }
  }

  return config
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function resetConfigCache(): void {
  cachedConfig = null
}
