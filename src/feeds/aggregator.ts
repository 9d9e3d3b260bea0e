/**
 * Current Affairs Digest — Feed Aggregator
 *
 * Runs the ingestion pipeline for one cycle:
 * 1. Read every configured feed URL, one at a time, in order
 * 2. Normalize entries (skip blank titles)
 * 3. Classify into subjects (skip unmatched)
 * 4. Cap each subject's bucket, keeping the earliest items
 */

import { mapSubjects, SUBJECT_ORDER } from '../types';
import type { Article, ClassifiedBuckets, FeedSourceConfig } from '../types';
import { RssFeedReader } from './base';
import type { FeedReader } from './base';
import { normalizeEntry } from './normalizer';
import { FEEDS } from './sources';
import { classifySubject } from '../matching';
import { getConfig } from '../lib/config';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorOptions {
  /** Maximum articles kept per subject */
  maxPerSubject?: number;
  /** Sources to read (default: compiled-in FEEDS) */
  feeds?: readonly FeedSourceConfig[];
  /** Feed reader (default: rss-parser over HTTP) */
  reader?: FeedReader;
}

export interface FeedFetchResult {
  source: string;
  url: string;
  entriesFound: number;
  articlesClassified: number;
  durationMs: number;
  error?: string;
}

export interface AggregationResult {
  buckets: ClassifiedBuckets;
  sourceResults: FeedFetchResult[];
  /** Entries returned by all readers, before filtering */
  totalEntries: number;
  /** Articles assigned a subject, before capping */
  totalClassified: number;
  errors: string[];
  fetchedAt: string;
  durationMs: number;
}

export const DEFAULT_MAX_PER_SUBJECT = 6;

// ============================================================
// BUCKETS
// ============================================================

export function emptyBuckets(): ClassifiedBuckets {
  return mapSubjects<Article[]>(() => []);
}

/**
 * Keep the first `max` articles of every subject.
 */
export function truncateBuckets(buckets: ClassifiedBuckets, max: number): ClassifiedBuckets {
  assertValidMax(max);
  return mapSubjects(subject => buckets[subject].slice(0, max));
}

function assertValidMax(max: number): void {
  if (!Number.isInteger(max) || max < 1) {
    throw new RangeError(`maxPerSubject must be a positive integer, got ${max}`);
  }
}

function defaultReader(): FeedReader {
  const { feeds } = getConfig();
  return new RssFeedReader({ timeoutMs: feeds.timeoutMs, userAgent: feeds.userAgent });
}

// ============================================================
// FETCH HELPERS
// ============================================================

/**
 * Read one URL and append its classified articles to the buckets.
 * Failures are recorded, never thrown.
 */
async function collectFromUrl(
  source: string,
  url: string,
  reader: FeedReader,
  buckets: ClassifiedBuckets
): Promise<FeedFetchResult> {
  const startTime = Date.now();

  try {
    const entries = await reader.read(url);
    let articlesClassified = 0;

    for (const entry of entries) {
      const article = normalizeEntry(entry, source);
      if (!article) continue;

      const subject = classifySubject(article.title, article.summary);
      if (!subject) continue;

      buckets[subject].push(article);
      articlesClassified++;
    }

    const durationMs = Date.now() - startTime;

    logger.info('Feed fetch completed', {
      source,
      url,
      entries: entries.length,
      classified: articlesClassified,
      durationMs,
    });

    return {
      source,
      url,
      entriesFound: entries.length,
      articlesClassified,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const message = errorMessage(error);

    logger.warn('Feed fetch failed', { source, url, error: message, durationMs });

    return {
      source,
      url,
      entriesFound: 0,
      articlesClassified: 0,
      durationMs,
      error: message,
    };
  }
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Fetch, normalize and classify articles from every configured feed.
 */
export async function fetchArticles(
  options: AggregatorOptions = {}
): Promise<AggregationResult> {
  const startTime = Date.now();
  const maxPerSubject = options.maxPerSubject ?? DEFAULT_MAX_PER_SUBJECT;
  assertValidMax(maxPerSubject);

  const feeds = options.feeds ?? FEEDS;
  const reader = options.reader ?? defaultReader();

  logger.info('Starting feed aggregation', {
    sources: feeds.map(f => f.name),
    maxPerSubject,
  });

  const collected = emptyBuckets();
  const sourceResults: FeedFetchResult[] = [];
  const errors: string[] = [];

  for (const feed of feeds) {
    for (const url of feed.urls) {
      const result = await collectFromUrl(feed.name, url, reader, collected);
      sourceResults.push(result);

      if (result.error) {
        errors.push(`${feed.name} (${url}): ${result.error}`);
      }
    }
  }

  const buckets = truncateBuckets(collected, maxPerSubject);
  const totalEntries = sourceResults.reduce((sum, r) => sum + r.entriesFound, 0);
  const totalClassified = sourceResults.reduce((sum, r) => sum + r.articlesClassified, 0);
  const durationMs = Date.now() - startTime;

  logger.info('Feed aggregation completed', {
    totalEntries,
    totalClassified,
    kept: SUBJECT_ORDER.reduce((sum, subject) => sum + buckets[subject].length, 0),
    errors: errors.length,
    durationMs,
  });

  return {
    buckets,
    sourceResults,
    totalEntries,
    totalClassified,
    errors,
    fetchedAt: new Date().toISOString(),
    durationMs,
  };
}
