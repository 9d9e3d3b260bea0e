/**
 * Current Affairs Digest — Article Types
 */

import type { Subject } from './subject';

/**
 * One item as handed back by a feed reader.
 * Absent fields are treated as empty strings.
 */
export interface FeedEntry {
  title?: string;
  summary?: string;
  link?: string;
}

/**
 * A named news outlet and the feed URLs fetched for it, in order.
 */
export interface FeedSourceConfig {
  name: string;
  urls: readonly string[];
}

/**
 * A classified feed entry. Summary is plain text.
 */
export interface Article {
  readonly source: string;
  readonly title: string;
  readonly summary: string;
  readonly link: string;
}

/**
 * Articles per subject, every subject present, in encounter order.
 */
export type ClassifiedBuckets = Record<Subject, Article[]>;
