/**
 * Memory Tier
 *
 * @module memory
 */

export {
  MemoryLruCache,
  type MemoryLruCacheOptions,
  type RemovalNotification,
  type RemovalReason,
} from './lru-memory-cache.js';
