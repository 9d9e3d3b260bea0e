/**
 * Current Affairs Digest — Feeds Module
 *
 * Reading, normalizing and bucketing news feeds.
 */

export { RssFeedReader, toFeedEntry, type FeedReader, type RssFeedReaderOptions } from './base';

export { stripHtml, normalizeEntry } from './normalizer';

export { FEEDS } from './sources';

export {
  fetchArticles,
  emptyBuckets,
  truncateBuckets,
  DEFAULT_MAX_PER_SUBJECT,
  type AggregatorOptions,
  type AggregationResult,
  type FeedFetchResult,
} from './aggregator';
