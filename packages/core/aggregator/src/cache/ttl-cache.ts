/**
 * Bounded TTL store with LRU eviction
 */

import { LRUCache } from 'lru-cache';
import { systemClock, type Clock } from '../types.js';

export interface CacheConfig {
  /** Max entries before least-recently-used eviction */
  maxSize?: number;
  /** Time to live in seconds */
  ttl?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Expiry is checked against the injected clock on read, so an expired
 * entry is never returned even if it has not been purged yet.
 */
export class TtlCache<V extends {}> {
  private cache: LRUCache<string, Entry<V>>;
  private stats: CacheStats;
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(config: CacheConfig = {}, clock: Clock = systemClock) {
    const maxSize = config.maxSize ?? 100;
    const ttl = config.ttl ?? 300;

    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`Invalid cache size: ${maxSize}`);
    }
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw new Error(`Invalid cache TTL: ${ttl}`);
    }

    this.ttlMs = ttl * 1000;
    this.clock = clock;
    this.stats = { hits: 0, misses: 0, evictions: 0, size: 0 };
    this.cache = new LRUCache<string, Entry<V>>({
      max: maxSize,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') this.stats.evictions++;
      },
    });
  }

  get(key: string): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.clock.now()) {
      this.cache.delete(key);
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    return entry.value;
  }

  set(key: string, value: V): void {
    if (!key) return;

    this.cache.set(key, { value, expiresAt: this.clock.now() + this.ttlMs });
    this.stats.size = this.cache.size;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
    this.stats = { hits: 0, misses: 0, evictions: 0, size: 0 };
  }

  getStats(): CacheStats {
    return {
      ...this.stats,
      size: this.cache.size,
    };
  }

  /**
   * Get cache hit rate (0-1)
   */
  getHitRate(): number {
    const total = this.stats.hits + this.stats.misses;
    return total === 0 ? 0 : this.stats.hits / total;
  }

  get size(): number {
    return this.cache.size;
  }
}
