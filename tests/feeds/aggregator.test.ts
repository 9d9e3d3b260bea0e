/**
 * Tests for the Feed Aggregator
 *
 * Feed access goes through an in-memory reader; nothing here
 * touches the network.
 */

import { describe, it, expect } from 'vitest';
import {
  fetchArticles,
  emptyBuckets,
  truncateBuckets,
  DEFAULT_MAX_PER_SUBJECT,
} from '../../src/feeds/aggregator';
import { renderNewsletterHtml } from '../../src/delivery/newsletter';
import { SUBJECT_ORDER } from '../../src/types';
import { StaticFeedReader, TEST_FEEDS, article, bucketsWith } from '../helpers/feeds';

const DAWN = 'memory://dawn/home';
const TRIBUNE_LATEST = 'memory://tribune/latest';
const TRIBUNE_OPINION = 'memory://tribune/opinion';

function inflationEntries(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    title: `Inflation report ${i + 1}`,
    link: `https://example.com/inflation/${i + 1}`,
  }));
}

describe('fetchArticles', () => {
  it('should classify entries into subject buckets in encounter order', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: [
        {
          title: 'SBP raises interest rate amid inflation concerns',
          summary: '<p>Policy rate <b>up</b> 100bps</p>',
          link: ' https://example.com/sbp ',
        },
        { title: 'Supreme Court hears Kashmir reference petition', link: 'https://example.com/sc' },
      ],
      [TRIBUNE_LATEST]: [
        { title: 'Inflation eases in October', link: 'https://example.com/cpi' },
        { title: '   ', summary: 'Blank title with inflation keyword' },
        { title: 'Cricket team wins final', link: 'https://example.com/cricket' },
      ],
      [TRIBUNE_OPINION]: [],
    });

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader });

    expect(result.buckets.Economy).toEqual([
      {
        source: 'Dawn',
        title: 'SBP raises interest rate amid inflation concerns',
        summary: 'Policy rate up 100bps',
        link: 'https://example.com/sbp',
      },
      {
        source: 'The Express Tribune',
        title: 'Inflation eases in October',
        summary: '',
        link: 'https://example.com/cpi',
      },
    ]);
    expect(result.buckets['Foreign Policy']).toEqual([
      {
        source: 'Dawn',
        title: 'Supreme Court hears Kashmir reference petition',
        summary: '',
        link: 'https://example.com/sc',
      },
    ]);
    expect(result.buckets['Constitutional Law and Judiciary']).toEqual([]);
    expect(result.totalEntries).toBe(5);
    expect(result.totalClassified).toBe(3);
    expect(result.errors).toEqual([]);
  });

  it('should never place blank-title or unmatched entries in a bucket', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: [
        { title: '', summary: 'inflation' },
        { summary: 'interest rate' },
        { title: 'Cricket team wins final' },
      ],
      [TRIBUNE_LATEST]: [],
      [TRIBUNE_OPINION]: [],
    });

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader });

    for (const subject of SUBJECT_ORDER) {
      expect(result.buckets[subject]).toEqual([]);
    }
    expect(result.totalEntries).toBe(3);
    expect(result.totalClassified).toBe(0);
  });

  it('should read URLs one at a time in configured order', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: [],
      [TRIBUNE_LATEST]: [],
      [TRIBUNE_OPINION]: [],
    });

    await fetchArticles({ feeds: TEST_FEEDS, reader });

    expect(reader.calls).toEqual([DAWN, TRIBUNE_LATEST, TRIBUNE_OPINION]);
    expect(reader.maxConcurrent).toBe(1);
  });

  it('should skip a failing URL and keep going', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: [{ title: 'Inflation hits new high' }],
      [TRIBUNE_LATEST]: new Error('ECONNREFUSED'),
      [TRIBUNE_OPINION]: [{ title: 'Why Kashmir matters' }],
    });

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader });

    expect(result.errors).toEqual(['The Express Tribune (memory://tribune/latest): ECONNREFUSED']);
    expect(result.sourceResults.map(r => r.error)).toEqual([undefined, 'ECONNREFUSED', undefined]);
    expect(result.sourceResults[1].entriesFound).toBe(0);
    expect(result.buckets.Economy.map(a => a.title)).toEqual(['Inflation hits new high']);
    expect(result.buckets['Foreign Policy'].map(a => a.title)).toEqual(['Why Kashmir matters']);
  });

  it('should leave every subject empty when all feeds fail', async () => {
    const reader = new StaticFeedReader({});

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader });

    expect(result.errors).toHaveLength(3);
    for (const subject of SUBJECT_ORDER) {
      expect(result.buckets[subject]).toEqual([]);
    }

    const html = renderNewsletterHtml(result.buckets, new Date(2026, 9, 19));
    expect(html).toContain(
      '<p class="date">Generated on 19 October 2026 (for personal reading / CSS prep)</p>\n  </main>'
    );
  });

  it('should cap each bucket keeping the earliest articles', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: inflationEntries(5),
      [TRIBUNE_LATEST]: [],
      [TRIBUNE_OPINION]: [],
    });

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader, maxPerSubject: 3 });

    expect(result.buckets.Economy.map(a => a.title)).toEqual([
      'Inflation report 1',
      'Inflation report 2',
      'Inflation report 3',
    ]);
    expect(result.totalClassified).toBe(5);
  });

  it('should default to six articles per subject', async () => {
    const reader = new StaticFeedReader({
      [DAWN]: inflationEntries(8),
      [TRIBUNE_LATEST]: [],
      [TRIBUNE_OPINION]: [],
    });

    const result = await fetchArticles({ feeds: TEST_FEEDS, reader });

    expect(DEFAULT_MAX_PER_SUBJECT).toBe(6);
    expect(result.buckets.Economy).toHaveLength(6);
  });

  it('should reject a non-positive cap', async () => {
    const reader = new StaticFeedReader({});

    await expect(fetchArticles({ feeds: TEST_FEEDS, reader, maxPerSubject: 0 })).rejects.toThrow(
      RangeError
    );
    await expect(fetchArticles({ feeds: TEST_FEEDS, reader, maxPerSubject: 2.5 })).rejects.toThrow(
      RangeError
    );
    expect(reader.calls).toEqual([]);
  });
});

describe('emptyBuckets', () => {
  it('should hold an empty array for every subject', () => {
    const buckets = emptyBuckets();
    expect(Object.keys(buckets)).toEqual(SUBJECT_ORDER);
    expect(Object.values(buckets).every(list => list.length === 0)).toBe(true);
  });
});

describe('truncateBuckets', () => {
  it('should not modify the input', () => {
    const input = bucketsWith({
      Gender: [article({ title: 'A' }), article({ title: 'B' }), article({ title: 'C' })],
    });

    const result = truncateBuckets(input, 2);

    expect(result.Gender.map(a => a.title)).toEqual(['A', 'B']);
    expect(input.Gender).toHaveLength(3);
  });
});
