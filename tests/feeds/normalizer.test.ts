/**
 * Tests for the Feed Normalizer
 */

import { describe, it, expect } from 'vitest';
import { stripHtml, normalizeEntry } from '../../src/feeds/normalizer';

describe('stripHtml', () => {
  it('should return empty string for missing input', () => {
    expect(stripHtml(undefined)).toBe('');
    expect(stripHtml(null)).toBe('');
    expect(stripHtml('')).toBe('');
  });

  it('should remove tags', () => {
    expect(stripHtml('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('should decode entities', () => {
    expect(stripHtml('Tom &amp; Jerry')).toBe('Tom & Jerry');
    expect(stripHtml('It&#39;s done')).toBe("It's done");
  });

  it('should strip markup that was itself escaped', () => {
    expect(stripHtml('&lt;em&gt;Budget&lt;/em&gt; passed')).toBe('Budget passed');
  });

  it('should fully decode double-escaped entities', () => {
    expect(stripHtml('Rates &amp;amp; yields')).toBe('Rates & yields');
  });

  it('should collapse whitespace and trim', () => {
    expect(stripHtml('  multiple   spaces\n\tand lines  ')).toBe('multiple spaces and lines');
    expect(stripHtml('&nbsp;Hello&nbsp;&nbsp;there')).toBe('Hello there');
  });

  it('should drop stray angle brackets', () => {
    expect(stripHtml('5 &lt; 6')).toBe('5 6');
    expect(stripHtml('x > y')).toBe('x y');
  });

  it('should drop entities that do not decode', () => {
    expect(stripHtml('&bogus; entity')).toBe('entity');
  });

  it('should never leave markup, entities or doubled spaces', () => {
    const samples = [
      '<div><p>Para one</p>\n\n<p>Para &quot;two&quot;</p></div>',
      '&amp;lt;script&amp;gt;alert(1)&amp;lt;/script&amp;gt;',
      'a <<b>> c',
      '<img src="x.png" alt="pic"> caption &hellip;',
      'Plain text only',
      '&amp;amp;amp;amp;amp; deep',
    ];

    for (const sample of samples) {
      const result = stripHtml(sample);
      expect(result).not.toMatch(/[<>]/);
      expect(result).not.toMatch(/&(?:#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/i);
      expect(result).not.toMatch(/\s{2}/);
      expect(result).toBe(result.trim());
    }
  });
});

describe('normalizeEntry', () => {
  it('should trim title and link and strip the summary', () => {
    const result = normalizeEntry(
      {
        title: '  Budget approved  ',
        summary: '<p>The assembly <em>passed</em> it.</p>',
        link: ' https://example.com/budget ',
      },
      'Dawn'
    );

    expect(result).toEqual({
      source: 'Dawn',
      title: 'Budget approved',
      summary: 'The assembly passed it.',
      link: 'https://example.com/budget',
    });
  });

  it('should return null for blank titles', () => {
    expect(normalizeEntry({ title: '   ', summary: 'x' }, 'Dawn')).toBeNull();
    expect(normalizeEntry({ summary: 'x' }, 'Dawn')).toBeNull();
  });

  it('should treat missing summary and link as empty', () => {
    expect(normalizeEntry({ title: 'Headline' }, 'The Express Tribune')).toEqual({
      source: 'The Express Tribune',
      title: 'Headline',
      summary: '',
      link: '',
    });
  });
});
