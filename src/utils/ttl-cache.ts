// ===========================================
// TTL CACHE
// Bounded, single-flight, explicitly owned
// ===========================================

import { logger } from './logger.js';

interface CacheEntry<T> {
  data: T;
  expiry: number;
}

export interface TtlCacheOptions {
  maxSize: number;
  sweepIntervalMs: number;
  now?: () => number;
}

export class TtlCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private inFlight: Map<string, Promise<T>> = new Map();
  private sweeper: NodeJS.Timeout | null = null;
  private disposed = false;
  private readonly now: () => number;

  constructor(private readonly options: TtlCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (entry.expiry <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: T, ttlMs: number): void {
    // Re-inserting moves the key to the end of the eviction order
    this.cache.delete(key);

    // Evict oldest entries if at capacity
    while (this.cache.size >= this.options.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    this.cache.set(key, { data, expiry: this.now() + ttlMs });
  }

  /**
   * Return the cached value, or run fetchFn once for all concurrent callers.
   * A rejected fetch is not cached, and nothing is stored once disposed.
   */
  getOrFetch(key: string, ttlMs: number, fetchFn: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return Promise.resolve(cached);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const promise = fetchFn()
      .then(value => {
        if (!this.disposed) this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  size(): number {
    return this.cache.size;
  }

  startSweeper(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweeper.unref();
  }

  sweep(): number {
    const now = this.now();
    let cleaned = 0;
    for (const [key, value] of this.cache) {
      if (value.expiry <= now) {
        this.cache.delete(key);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      logger.debug({ cleaned, remaining: this.cache.size }, 'TtlCache sweep');
    }
    return cleaned;
  }

  dispose(): void {
    this.disposed = true;
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    this.cache.clear();
    this.inFlight.clear();
  }
}
