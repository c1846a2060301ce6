/**
 * @entry Config module
 *
 * YAML config loading, schema validation, env overrides
 */

export {
  loadConfig,
  getDefaultConfig,
  resetConfigCache,
  applyEnvOverrides,
  deepMergeConfig,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'
