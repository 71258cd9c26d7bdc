/**
 * Bounded in-memory cache with per-instance TTL.
 *
 * Entries leave the cache when they expire or when they are the least recently used
 * entry and a new key needs room, whichever comes first. Map insertion order doubles as
 * the recency list: reads re-insert the key at the tail.
 */

export interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export type TtlCacheOptions = {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
};

export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly now: () => number;
  readonly maxSize: number;
  readonly ttlMs: number;

  constructor(options: TtlCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (!(options.ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => Date.now());
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    this.evictExpired();

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  private evictExpired() {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
