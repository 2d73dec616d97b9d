import type { CacheConfig } from './schema.js';

/**
 * Default configuration, memory-only until a directory is given
 */
export const DEFAULT_CONFIG: CacheConfig = {
  appVersion: 1,
  maxMemorySize: 1000,
  maxDiskSize: 50 * 1024 * 1024,
  logLevel: 'warn',
};
