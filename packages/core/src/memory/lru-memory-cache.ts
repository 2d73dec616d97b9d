/**
 * Memory LRU Cache
 *
 * Weight-bounded in-memory LRU. Recency order comes from Map insertion
 * order: the first key is the least recently used.
 *
 * Hooks (`create`, `onRemoved`, `sizeOf`) may call back into the cache.
 * Every mutation re-reads state after a hook returns, so a reentrant
 * `put` while `create` is running wins over the created value.
 *
 * @module memory/lru-memory-cache
 */

/**
 * Why an entry left the cache
 *
 * - `evicted`: dropped to reclaim space
 * - `removed`: replaced by `put`, deleted by `remove`/`clear`, or a created
 *   value that lost to a concurrent `put`
 */
export type RemovalReason = 'evicted' | 'removed';

export interface RemovalNotification<V> {
  reason: RemovalReason;
  key: string;
  oldValue: V;
  /** The replacing value when the removal was caused by a put, otherwise null */
  newValue: V | null;
}

export interface MemoryLruCacheOptions<V> {
  /** Maximum total weight of resident entries */
  maxSize: number;
  /** Weight of an entry. Defaults to 1, so maxSize is an entry count. */
  sizeOf?: (key: string, value: V) => number;
  /** Computes a value on a miss. Returning null leaves the miss as is. */
  create?: (key: string) => V | null;
  /** Called for every entry that leaves the cache */
  onRemoved?: (notification: RemovalNotification<V>) => void;
}

interface MemoryEntry<V> {
  value: V;
  /** Computed once at insertion */
  weight: number;
}

/**
 * In-memory LRU cache bounded by total entry weight
 */
export class MemoryLruCache<V extends {}> {
  private readonly map = new Map<string, MemoryEntry<V>>();
  private readonly _maxSize: number;
  private readonly sizeOfFn: (key: string, value: V) => number;
  private readonly createFn: ((key: string) => V | null) | undefined;
  private readonly onRemovedFn: ((notification: RemovalNotification<V>) => void) | undefined;

  private _size = 0;
  private _hitCount = 0;
  private _missCount = 0;
  private _createCount = 0;
  private _putCount = 0;
  private _evictionCount = 0;

  constructor(options: MemoryLruCacheOptions<V>) {
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this._maxSize = options.maxSize;
    this.sizeOfFn = options.sizeOf ?? (() => 1);
    this.createFn = options.create;
    this.onRemovedFn = options.onRemoved;
  }

  /**
   * Get the value for key, creating it on a miss if a create hook is set.
   * A hit moves the entry to the most recently used position.
   */
  get(key: string): V | null {
    assertKey(key);

    const entry = this.map.get(key);
    if (entry) {
      this.touch(key, entry);
      this._hitCount++;
      return entry.value;
    }
    this._missCount++;

    if (!this.createFn) return null;

    const created = this.createFn(key);
    if (created === null || created === undefined) return null;
    this._createCount++;

    // The key may have been filled while create ran.
    const existing = this.map.get(key);
    if (existing) {
      this.touch(key, existing);
      this.notify({ reason: 'removed', key, oldValue: created, newValue: existing.value });
      return existing.value;
    }

    this.insertEntry(key, created);
    this.trimToSize(this._maxSize);
    return created;
  }

  /**
   * Cache value for key as the most recently used entry.
   * Returns the replaced value, if any.
   */
  put(key: string, value: V): V | null {
    this._putCount++;
    return this.store(key, value);
  }

  /**
   * Insert a value fetched from elsewhere. Same as put, without counting a put.
   */
  promote(key: string, value: V): V | null {
    return this.store(key, value);
  }

  /**
   * Remove the entry for key, returning its value
   */
  remove(key: string): V | null {
    assertKey(key);

    const entry = this.map.get(key);
    if (!entry) return null;

    this.map.delete(key);
    this._size -= entry.weight;
    this.notify({ reason: 'removed', key, oldValue: entry.value, newValue: null });
    return entry.value;
  }

  /**
   * Check residency without touching recency or counters
   */
  has(key: string): boolean {
    return this.map.has(key);
  }

  /**
   * Evict least recently used entries until the total weight is at most maxSize.
   * Pass -1 to evict everything.
   */
  trimToSize(maxSize: number): void {
    while (this._size > maxSize && this.map.size > 0) {
      const eldest = this.map.entries().next();
      if (eldest.done) break;

      const [key, entry] = eldest.value;
      this.map.delete(key);
      this._size -= entry.weight;
      this._evictionCount++;
      this.notify({ reason: 'evicted', key, oldValue: entry.value, newValue: null });
    }
  }

  /**
   * Evict every entry, counting each as an eviction
   */
  evictAll(): void {
    this.trimToSize(-1);
  }

  /**
   * Remove every entry as if by remove()
   */
  clear(): void {
    for (const key of Array.from(this.map.keys())) {
      this.remove(key);
    }
  }

  /** Total weight of resident entries */
  get size(): number {
    return this._size;
  }

  get maxSize(): number {
    return this._maxSize;
  }

  /** Number of gets that returned a resident value */
  get hitCount(): number {
    return this._hitCount;
  }

  /** Number of gets that found nothing resident */
  get missCount(): number {
    return this._missCount;
  }

  /** Number of times the create hook returned a value */
  get createCount(): number {
    return this._createCount;
  }

  get putCount(): number {
    return this._putCount;
  }

  get evictionCount(): number {
    return this._evictionCount;
  }

  /**
   * Copy of the current contents, least recently used first
   */
  snapshot(): Map<string, V> {
    const copy = new Map<string, V>();
    for (const [key, entry] of this.map) {
      copy.set(key, entry.value);
    }
    return copy;
  }

  toString(): string {
    const accesses = this._hitCount + this._missCount;
    const hitPercent = accesses !== 0 ? Math.floor((100 * this._hitCount) / accesses) : 0;
    return `MemoryLruCache[maxSize=${this._maxSize},hits=${this._hitCount},misses=${this._missCount},hitRate=${hitPercent}%]`;
  }

  // Private helpers

  private store(key: string, value: V): V | null {
    assertKey(key);
    assertValue(value);

    const weight = this.safeSizeOf(key, value);
    const previous = this.map.get(key);
    if (previous) {
      this.map.delete(key);
      this._size -= previous.weight;
    }
    this.map.set(key, { value, weight });
    this._size += weight;

    if (previous) {
      this.notify({ reason: 'removed', key, oldValue: previous.value, newValue: value });
    }
    this.trimToSize(this._maxSize);
    return previous ? previous.value : null;
  }

  private insertEntry(key: string, value: V): void {
    const weight = this.safeSizeOf(key, value);
    this.map.set(key, { value, weight });
    this._size += weight;
  }

  private touch(key: string, entry: MemoryEntry<V>): void {
    this.map.delete(key);
    this.map.set(key, entry);
  }

  private safeSizeOf(key: string, value: V): number {
    const weight = this.sizeOfFn(key, value);
    if (!Number.isInteger(weight) || weight < 0) {
      throw new RangeError(`Invalid size for key "${key}": ${weight}`);
    }
    return weight;
  }

  private notify(notification: RemovalNotification<V>): void {
    this.onRemovedFn?.(notification);
  }
}

function assertKey(key: string): void {
  if (key === null || key === undefined) {
    throw new TypeError('key must not be null');
  }
}

function assertValue(value: unknown): void {
  if (value === null || value === undefined) {
    throw new TypeError('value must not be null');
  }
}
