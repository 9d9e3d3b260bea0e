/**
 * Current Affairs Digest — Feed Reader
 *
 * The collaborator the aggregator pulls entries from.
 * Production reads RSS/Atom over HTTP with rss-parser; tests
 * hand the aggregator an in-memory reader instead.
 */

import Parser from 'rss-parser';
import type { FeedEntry } from '../types';
import { logger } from '../lib/logger';
import type { Logger } from '../lib/logger';

/**
 * Anything that can turn a feed URL into entries.
 * Must reject when the feed cannot be fetched or parsed.
 */
export interface FeedReader {
  read(url: string): Promise<FeedEntry[]>;
}

export interface RssFeedReaderOptions {
  /** Request timeout in ms */
  timeoutMs?: number;
  /** User-Agent header sent with every request */
  userAgent?: string;
}

function stringField(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a parsed feed item onto a FeedEntry.
 * RSS `description` arrives as `content`; Atom uses `summary`.
 */
export function toFeedEntry(item: Record<string, unknown>): FeedEntry {
  return {
    title: stringField(item.title),
    summary:
      stringField(item.summary) ??
      stringField(item.content) ??
      stringField(item.contentSnippet),
    link: stringField(item.link),
  };
}

/**
 * rss-parser backed reader.
 */
export class RssFeedReader implements FeedReader {
  private readonly parser: Parser;
  protected logger: Logger = logger.child({ component: 'rss-reader' });

  constructor(options: RssFeedReaderOptions = {}) {
    this.parser = new Parser({
      timeout: options.timeoutMs ?? 15000,
      headers: options.userAgent ? { 'User-Agent': options.userAgent } : undefined,
    });
  }

  async read(url: string): Promise<FeedEntry[]> {
    const feed = await this.parser.parseURL(url);

    this.logger.debug('Feed parsed', { url, title: feed.title, items: feed.items.length });

    return feed.items.map(item => toFeedEntry(item));
  }
}
