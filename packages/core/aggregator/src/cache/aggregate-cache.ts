/**
 * The four operation stores owned by one aggregator
 */

import type { Clock, DocumentContent, DocumentFailure, RecentUpdate, SearchResult, SourceDocumentRef } from '../types.js';
import { systemClock } from '../types.js';
import { TtlCache, type CacheConfig, type CacheStats } from './ttl-cache.js';

export interface AggregateCacheConfig {
  /** When false every lookup misses and nothing is stored */
  enabled?: boolean;
  search?: CacheConfig;
  document?: CacheConfig;
  updates?: CacheConfig;
  summary?: CacheConfig;
}

export const DEFAULT_CACHE_CONFIG = {
  search: { ttl: 300, maxSize: 100 },
  document: { ttl: 600, maxSize: 100 },
  updates: { ttl: 300, maxSize: 50 },
  summary: { ttl: 600, maxSize: 100 },
} satisfies Record<string, Required<CacheConfig>>;

/**
 * A stored summary together with the ids that could not be fetched for it
 */
export interface CachedSummary {
  readonly summary: string;
  readonly keyPoints: readonly string[];
  readonly sourceDocuments: readonly SourceDocumentRef[];
  readonly failures: readonly DocumentFailure[];
}

export class AggregateCache {
  readonly enabled: boolean;
  readonly search: TtlCache<readonly SearchResult[]>;
  readonly document: TtlCache<DocumentContent>;
  readonly updates: TtlCache<readonly RecentUpdate[]>;
  readonly summary: TtlCache<CachedSummary>;

  constructor(config: AggregateCacheConfig = {}, clock: Clock = systemClock) {
    this.enabled = config.enabled ?? true;
    this.search = new TtlCache({ ...DEFAULT_CACHE_CONFIG.search, ...config.search }, clock);
    this.document = new TtlCache({ ...DEFAULT_CACHE_CONFIG.document, ...config.document }, clock);
    this.updates = new TtlCache({ ...DEFAULT_CACHE_CONFIG.updates, ...config.updates }, clock);
    this.summary = new TtlCache({ ...DEFAULT_CACHE_CONFIG.summary, ...config.summary }, clock);
  }

  read<V extends {}>(store: TtlCache<V>, key: string): V | undefined {
    return this.enabled ? store.get(key) : undefined;
  }

  write<V extends {}>(store: TtlCache<V>, key: string, value: V): void {
    if (this.enabled) store.set(key, value);
  }

  clear(): void {
    this.search.clear();
    this.document.clear();
    this.updates.clear();
    this.summary.clear();
  }

  getStats(): Record<'search' | 'document' | 'updates' | 'summary', CacheStats> {
    return {
      search: this.search.getStats(),
      document: this.document.getStats(),
      updates: this.updates.getStats(),
      summary: this.summary.getStats(),
    };
  }
}
