/**
 * @fileoverview Bounded address -> Page cache
 *
 * Map insertion order doubles as the eviction queue: `lru` re-inserts an
 * entry on every hit, `fifo` leaves the order alone. `maxEntries = 0` turns
 * caching off while still counting misses.
 */

import { ValidationError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { EvictionPolicy } from '../config/schema.js';
import type { Page } from '../search/types.js';

export interface PageCacheStats {
  size: number;
  maxEntries: number;
  eviction: EvictionPolicy;
  hits: number;
  misses: number;
  evictions: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
}

export interface CacheLookup {
  page: Page;
  hit: boolean;
}

export class PageCache {
  private readonly entries = new Map<string, Page>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    readonly maxEntries: number,
    readonly eviction: EvictionPolicy = 'lru',
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new ValidationError('cache.maxEntries', 'a non-negative integer', String(maxEntries));
    }
  }

  get(address: string): Page | null {
    const page = this.entries.get(address);
    if (!page) {
      this.misses++;
      return null;
    }
    this.hits++;
    if (this.eviction === 'lru') {
      this.entries.delete(address);
      this.entries.set(address, page);
    }
    return page;
  }

  peek(address: string): Page | null {
    return this.entries.get(address) ?? null;
  }

  set(address: string, page: Page): void {
    if (this.maxEntries === 0) return;
    if (this.entries.has(address)) {
      this.entries.delete(address);
    }
    this.entries.set(address, page);
    this.evictIfNeeded();
  }

  /**
   * Lookup and fill in one synchronous step.
   */
  getOrCompute(address: string, compute: (address: string) => Page): CacheLookup {
    const cached = this.get(address);
    if (cached) return { page: cached, hit: true };
    const page = compute(address);
    this.set(address, page);
    return { page, hit: false };
  }

  has(address: string): boolean {
    return this.entries.has(address);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Drops every entry and resets the counters. */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): PageCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      eviction: this.eviction,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private evictIfNeeded(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
      this.evictions++;
      logDebug('[page-cache] evicted entry', { address: oldest.value, policy: this.eviction });
    }
  }
}
