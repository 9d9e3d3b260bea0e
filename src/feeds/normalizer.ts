/**
 * Current Affairs Digest — Feed Normalizer
 *
 * Turns raw feed entries into plain-text Articles.
 */

import * as cheerio from 'cheerio';
import type { Article, FeedEntry } from '../types';

// ============================================================
// TEXT
// ============================================================

// Double-escaped summaries ("&amp;lt;p&amp;gt;") need more than one pass
const MAX_DECODE_PASSES = 3;

const MARKUP_PATTERN = /<[^>]*>|&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/i;
const ENTITY_PATTERN = /&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/gi;

/**
 * Remove tags, decode entities and collapse whitespace.
 * Never returns `<`, `>` or an entity sequence.
 */
export function stripHtml(text?: string | null): string {
  if (!text) return '';

  let current = text;
  for (let pass = 0; pass < MAX_DECODE_PASSES && MARKUP_PATTERN.test(current); pass++) {
    current = cheerio.load(current, null, false).root().text();
  }

  return current
    .replace(ENTITY_PATTERN, ' ')
    .replace(/[<>]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// ============================================================
// ENTRIES
// ============================================================

/**
 * Normalize one feed entry for a source.
 * Returns null when the title is blank.
 */
export function normalizeEntry(entry: FeedEntry, source: string): Article | null {
  const title = (entry.title ?? '').trim();
  if (!title) return null;

  return {
    source,
    title,
    summary: stripHtml(entry.summary),
    link: (entry.link ?? '').trim(),
  };
}
