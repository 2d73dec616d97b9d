/**
 * tierlru-core
 *
 * Two-level LRU cache: a bounded memory tier backed by a persistent
 * disk tier under one key space.
 *
 * @module tierlru-core
 */

export * from './cache/index.js';
export * from './memory/index.js';
export * from './disk/index.js';
export * from './converter/index.js';
export * from './config/index.js';
export {
  CacheConfigError,
  DiskStoreError,
  ConverterError,
  ConfigLoadError,
  ConfigParseError,
  toError,
} from './errors.js';
export {
  createConsoleLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';
