/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `cqa config` commands.
 */

// Schema and types
export { ConfigSchema, PartialConfigSchema, ObservabilityConfigSchema } from './schema.js';
export type { Config, PartialConfig, ObservabilityConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  getConfigKeys,
} from './loader.js';

// Paths
export { getDataDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
