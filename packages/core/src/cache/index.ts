/**
 * Two-Level Cache Module
 *
 * @module cache
 */

export {
  TwoLevelLruCache,
  type TwoLevelLruCacheOptions,
  type TwoLevelCacheHooks,
  type TwoLevelCacheStats,
  type DiskTierOptions,
} from './two-level-cache.js';
