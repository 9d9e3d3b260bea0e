/**
 * Current Affairs Digest — HTML helpers shared by both renderers
 */

import type { Article } from '../types';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * "05 October 2026", in local time.
 */
export function formatGeneratedDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  return `${day} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
}

/**
 * One article card. `indent` is prefixed to every line.
 */
export function renderArticleCard(article: Article, indent = ''): string {
  const lines = [
    '<article class="item">',
    `  <h3>${escapeHtml(article.title)}</h3>`,
    `  <p class="meta">${escapeHtml(article.source)}</p>`,
  ];

  if (article.summary) {
    lines.push(`  <p class="summary">${escapeHtml(article.summary)}</p>`);
  }

  lines.push(
    `  <a href="${escapeHtml(article.link)}" target="_blank" rel="noopener noreferrer">Read full piece</a>`,
    '</article>'
  );

  return lines.map(line => `${indent}${line}\n`).join('');
}
