/**
 * Current Affairs Digest — Classification Cache
 *
 * Memoizes aggregation results per items-per-subject cap for a fixed
 * lifetime. A different cap is a different key, so changing the cap
 * fetches again. `invalidate()` backs the dashboard's refresh action.
 */

import type { AggregationResult } from '../feeds';
import { logger } from '../lib/logger';

export type ArticleFetcher = (maxPerSubject: number) => Promise<AggregationResult>;

export interface CacheLookup {
  result: AggregationResult;
  cached: boolean;
}

interface CacheEntry {
  promise: Promise<AggregationResult>;
  expiresAt: number;
}

export class ClassificationCache {
  private readonly entries = new Map<number, CacheEntry>();
  private readonly log = logger.child({ component: 'classification-cache' });

  constructor(
    private readonly fetcher: ArticleFetcher,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Cached result for a cap, fetching when missing or expired.
   * Callers arriving while a fetch is in flight share it.
   */
  async get(maxPerSubject: number): Promise<CacheLookup> {
    const existing = this.entries.get(maxPerSubject);
    if (existing && existing.expiresAt > this.now()) {
      return { result: await existing.promise, cached: true };
    }

    this.log.info('Cache miss, fetching feeds', { maxPerSubject, expired: Boolean(existing) });

    const entry: CacheEntry = {
      promise: this.fetcher(maxPerSubject),
      expiresAt: this.now() + this.ttlMs,
    };
    this.entries.set(maxPerSubject, entry);

    try {
      return { result: await entry.promise, cached: false };
    } catch (error) {
      // Only evict if a refresh hasn't already replaced the entry
      if (this.entries.get(maxPerSubject) === entry) {
        this.entries.delete(maxPerSubject);
      }
      throw error;
    }
  }

  /**
   * Drop every cached result.
   */
  invalidate(): void {
    this.log.info('Cache invalidated', { entries: this.entries.size });
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
