/**
 * Configuration Module
 *
 * @module config
 */

export {
  ConfigLoader,
  loadConfig,
  CONFIG_FILE,
  ENV_VARS,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config-loader.js';
export { DEFAULT_CONFIG } from './defaults.js';
export { CacheConfigSchema, describeIssue, type CacheConfig } from './schema.js';
