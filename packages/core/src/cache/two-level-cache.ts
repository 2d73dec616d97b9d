/**
 * Two-Level LRU Cache
 *
 * A small weight-bounded memory tier (L1) in front of a larger, persistent
 * disk tier (L2), sharing one key space:
 *
 * - put writes L1, then writes through to L2 on a best-effort basis
 * - get reads L1, then the create hook, then L2, promoting disk hits into L1
 * - L1 capacity evictions leave the L2 copy in place; explicit removals
 *   and overwrites drop it
 *
 * Disk failures inside get/put/remove are logged and treated as if the disk
 * operation never happened. L1 stays authoritative throughout.
 *
 * @module cache/two-level-cache
 */

import { z } from 'zod';

import { describeIssue, type CacheConfig } from '../config/schema.js';
import { isConverter, type Converter } from '../converter/types.js';
import { DiskLruStore } from '../disk/disk-lru-store.js';
import { CacheConfigError, toError } from '../errors.js';
import { createConsoleLogger, type Logger } from '../logger.js';
import { MemoryLruCache, type RemovalNotification } from '../memory/lru-memory-cache.js';

/** Each disk entry holds exactly one value */
const VALUE_INDEX = 0;

export interface DiskTierOptions<V> {
  /** Writable directory owned by the disk tier */
  directory: string;
  /** Format version of stored values; a store written with another version is rejected */
  appVersion: number;
  /** Maximum bytes on disk. Must exceed maxMemorySize. */
  maxSize: number;
  converter: Converter<V>;
}

export interface TwoLevelLruCacheOptions<V> {
  /** Maximum total weight of the memory tier */
  maxMemorySize: number;
  /** Enables the disk tier */
  disk?: DiskTierOptions<V> | undefined;
  /**
   * Weight of an entry in the memory tier (default: 1).
   * Must return the same weight for a value for as long as it is cached.
   */
  sizeOf?: ((key: string, value: V) => number) | undefined;
  /**
   * Computes a value on a memory miss. Runs before the disk tier is
   * consulted; a non-null result is written through to disk and cached.
   */
  create?: ((key: string) => V | null) | undefined;
  /**
   * Called after the cache's own handling of every memory-tier removal.
   * May run while other cache operations for the same key are pending.
   */
  entryRemoved?: ((notification: RemovalNotification<V>) => void) | undefined;
  logger?: Logger | undefined;
}

export interface TwoLevelCacheHooks<V> {
  sizeOf?: TwoLevelLruCacheOptions<V>['sizeOf'];
  create?: TwoLevelLruCacheOptions<V>['create'];
  entryRemoved?: TwoLevelLruCacheOptions<V>['entryRemoved'];
  logger?: Logger | undefined;
}

/**
 * Counters and sizes. Counters reflect the memory tier only, so a get
 * served from disk counts as a miss.
 */
export interface TwoLevelCacheStats {
  hitCount: number;
  missCount: number;
  createCount: number;
  putCount: number;
  evictionCount: number;
  /** hitCount / (hitCount + missCount), 0 before any get */
  hitRate: number;
  memorySize: number;
  maxMemorySize: number;
  diskSize: number;
  maxDiskSize: number;
}

const TierSizesSchema = z.object({
  maxMemorySize: z.number().int().positive(),
  disk: z
    .object({
      directory: z.string().min(1),
      appVersion: z.number().int().nonnegative(),
      maxSize: z.number().int().positive(),
    })
    .optional(),
});

/**
 * Reject invalid options before any I/O happens
 */
function validateOptions<V>(options: TwoLevelLruCacheOptions<V>): void {
  const parsed = TierSizesSchema.safeParse({
    maxMemorySize: options.maxMemorySize,
    disk: options.disk && {
      directory: options.disk.directory,
      appVersion: options.disk.appVersion,
      maxSize: options.disk.maxSize,
    },
  });
  if (!parsed.success) {
    throw new CacheConfigError(`Invalid cache options: ${describeIssue(parsed.error)}`);
  }

  if (!options.disk) return;

  if (options.maxMemorySize >= options.disk.maxSize) {
    throw new CacheConfigError('The disk tier must be larger than the memory tier (maxMemorySize < disk.maxSize)');
  }
  if (!isConverter(options.disk.converter)) {
    throw new CacheConfigError('A converter must be supplied for the disk tier');
  }
}

/**
 * Two-level LRU cache with string keys
 */
export class TwoLevelLruCache<V extends {}> {
  private readonly memory: MemoryLruCache<V>;
  private readonly disk: DiskLruStore | null;
  private readonly converter: Converter<V> | null;
  private readonly createHook: ((key: string) => V | null) | undefined;
  private readonly entryRemovedHook: ((notification: RemovalNotification<V>) => void) | undefined;
  private readonly logger: Logger;

  constructor(options: TwoLevelLruCacheOptions<V>) {
    validateOptions(options);

    this.logger = options.logger ?? createConsoleLogger();
    this.createHook = options.create;
    this.entryRemovedHook = options.entryRemoved;
    this.converter = options.disk?.converter ?? null;

    this.memory = new MemoryLruCache<V>({
      maxSize: options.maxMemorySize,
      sizeOf: options.sizeOf,
      create: options.create ? (key) => this.createAndPersist(key) : undefined,
      onRemoved: (notification) => this.handleRemoval(notification),
    });

    this.disk = options.disk
      ? DiskLruStore.open({
          directory: options.disk.directory,
          appVersion: options.disk.appVersion,
          valueCount: 1,
          maxSize: options.disk.maxSize,
        })
      : null;
  }

  /**
   * Build a cache from loaded configuration. A disk tier is opened when
   * the configuration names a directory.
   */
  static fromConfig<T extends {}>(
    config: CacheConfig,
    converter: Converter<T>,
    hooks: TwoLevelCacheHooks<T> = {}
  ): TwoLevelLruCache<T> {
    return new TwoLevelLruCache<T>({
      maxMemorySize: config.maxMemorySize,
      disk:
        config.directory !== undefined
          ? {
              directory: config.directory,
              appVersion: config.appVersion,
              maxSize: config.maxDiskSize,
              converter,
            }
          : undefined,
      ...hooks,
      logger: hooks.logger ?? createConsoleLogger(config.logLevel),
    });
  }

  /**
   * Returns the cached value for key, or null.
   *
   * Lookup order: memory tier, create hook, disk tier. A disk hit is
   * promoted into the memory tier. Unreadable disk entries count as misses.
   */
  get(key: string): V | null {
    const value = this.memory.get(key);
    if (value !== null || !this.disk) {
      return value;
    }

    const restored = this.readFromDisk(this.disk, key);
    if (restored !== null) {
      this.memory.promote(key, restored);
    }
    return restored;
  }

  /**
   * Caches value for key. The memory write always happens; the disk
   * write-through is best effort. Returns the previous memory value.
   */
  put(key: string, value: V): V | null {
    const previous = this.memory.put(key, value);
    this.writeToDisk(key, value);
    return previous;
  }

  /**
   * Removes key from both tiers. Returns the value held in memory, if any.
   */
  remove(key: string): V | null {
    const previous = this.memory.remove(key);
    this.removeFromDisk(key);
    return previous;
  }

  /**
   * Clears both tiers. The disk tier is deleted along with every file in
   * its directory and stays closed afterwards.
   */
  evictAll(): void {
    this.memory.clear();
    this.evictAllDisk();
  }

  /**
   * Evicts every memory entry. Disk copies are kept and remain promotable.
   */
  evictAllMem(): void {
    this.memory.evictAll();
  }

  /**
   * Closes the disk tier and deletes every file in its directory,
   * including files the cache did not create
   */
  evictAllDisk(): void {
    this.disk?.delete();
  }

  getStats(): TwoLevelCacheStats {
    const hitCount = this.memory.hitCount;
    const missCount = this.memory.missCount;
    const accesses = hitCount + missCount;

    return {
      hitCount,
      missCount,
      createCount: this.memory.createCount,
      putCount: this.memory.putCount,
      evictionCount: this.memory.evictionCount,
      hitRate: accesses > 0 ? hitCount / accesses : 0,
      memorySize: this.sizeMem(),
      maxMemorySize: this.maxSizeMem(),
      diskSize: this.sizeDisk(),
      maxDiskSize: this.maxSizeDisk(),
    };
  }

  hitCount(): number {
    return this.memory.hitCount;
  }

  missCount(): number {
    return this.memory.missCount;
  }

  createCount(): number {
    return this.memory.createCount;
  }

  putCount(): number {
    return this.memory.putCount;
  }

  evictionCount(): number {
    return this.memory.evictionCount;
  }

  /** Total weight of memory entries */
  sizeMem(): number {
    return this.memory.size;
  }

  /** Bytes stored on disk; 0 without a disk tier */
  sizeDisk(): number {
    return this.disk ? this.disk.size() : 0;
  }

  maxSizeMem(): number {
    return this.memory.maxSize;
  }

  maxSizeDisk(): number {
    return this.disk ? this.disk.maxSize() : 0;
  }

  /**
   * Copy of the memory tier, least recently used first
   */
  snapshot(): Map<string, V> {
    return this.memory.snapshot();
  }

  /** Disk directory, or null without a disk tier */
  get directory(): string | null {
    return this.disk ? this.disk.directory : null;
  }

  /** True once the disk tier is closed, and always without one */
  isClosed(): boolean {
    return this.disk ? this.disk.isClosed() : true;
  }

  /**
   * Force buffered disk writes to the file system
   */
  flush(): void {
    this.disk?.flush();
  }

  /**
   * Close the disk tier. Stored values remain on disk.
   */
  close(): void {
    this.disk?.close();
  }

  toString(): string {
    return this.memory.toString();
  }

  // Private helpers

  private createAndPersist(key: string): V | null {
    if (!this.createHook) return null;

    const created = this.createHook(key);
    if (created === null || created === undefined) return null;

    // Kept in memory even if the disk write fails.
    this.writeToDisk(key, created);
    return created;
  }

  private handleRemoval(notification: RemovalNotification<V>): void {
    if (notification.reason === 'removed') {
      this.removeFromDisk(notification.key);
    }
    this.entryRemovedHook?.(notification);
  }

  private readFromDisk(disk: DiskLruStore, key: string): V | null {
    if (!this.converter) return null;

    try {
      const snapshot = disk.get(key);
      if (!snapshot) return null;
      return this.converter.fromBytes(snapshot.getBytes(VALUE_INDEX));
    } catch (err) {
      this.logger.warn(`Unable to get entry from disk cache. key: ${key} (${toError(err).message})`);
      return null;
    }
  }

  private writeToDisk(key: string, value: V): void {
    if (!this.disk || !this.converter) return;

    try {
      const editor = this.disk.edit(key);
      if (!editor) {
        this.logger.debug(`Disk entry is being edited elsewhere, skipping write. key: ${key}`);
        return;
      }
      try {
        this.converter.toBytes(value, editor.newSink(VALUE_INDEX));
        editor.commit();
      } finally {
        editor.abortUnlessCommitted();
      }
    } catch (err) {
      this.logger.warn(`Unable to put entry to disk cache. key: ${key} (${toError(err).message})`);
    }
  }

  private removeFromDisk(key: string): void {
    if (!this.disk) return;

    try {
      this.disk.remove(key);
    } catch (err) {
      this.logger.warn(`Unable to remove entry from disk cache. key: ${key} (${toError(err).message})`);
    }
  }
}
