/**
 * Current Affairs Digest — Static Newsletter Renderer
 *
 * One self-contained HTML document: embedded styles, header,
 * generation date, then a section per non-empty subject.
 * Output depends only on the buckets and the timestamp.
 */

import { SUBJECT_ORDER } from '../types';
import type { ClassifiedBuckets } from '../types';
import { escapeHtml, formatGeneratedDate, renderArticleCard } from './html';

export const NEWSLETTER_TITLE = 'CSS Current Affairs Newsletter';

const SUBJECT_DESCRIPTION =
  'Scan these for arguments, data points, and case studies you can plug into essays.';

const NEWSLETTER_STYLES = `
    :root {
      --primary: #035076;
      --bg: #f5f7fb;
      --card-bg: #ffffff;
      --text-main: #111827;
      --text-muted: #6b7280;
      --border: #e5e7eb;
    }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      padding: 0;
      font-family: 'Inter', system-ui, -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
      background: var(--bg);
      color: var(--text-main);
    }
    .container {
      max-width: 900px;
      margin: 24px auto 40px;
      padding: 0 16px;
    }
    header {
      background: var(--primary);
      color: white;
      padding: 20px 16px;
      margin: -8px 0 24px;
    }
    header h1 {
      margin: 0;
      font-size: 1.8rem;
      font-weight: 600;
    }
    header p {
      margin: 4px 0 0;
      font-size: 0.95rem;
      opacity: 0.85;
    }
    .date {
      margin: 0 0 24px;
      font-size: 0.9rem;
      color: var(--text-muted);
    }
    .subject { margin-bottom: 28px; }
    .subject h2 {
      font-size: 1.2rem;
      margin-bottom: 8px;
      color: var(--primary);
      border-left: 4px solid var(--primary);
      padding-left: 8px;
    }
    .subject-description {
      margin: 0 0 10px;
      font-size: 0.9rem;
      color: var(--text-muted);
    }
    .item {
      background: var(--card-bg);
      border-radius: 10px;
      border: 1px solid var(--border);
      padding: 10px 12px;
      margin-bottom: 8px;
    }
    .item h3 {
      margin: 0 0 4px;
      font-size: 0.95rem;
    }
    .meta {
      margin: 0 0 4px;
      font-size: 0.75rem;
      text-transform: uppercase;
      letter-spacing: 0.04em;
      color: var(--text-muted);
    }
    .summary {
      margin: 0 0 6px;
      font-size: 0.88rem;
      color: var(--text-main);
    }
    a {
      color: var(--primary);
      text-decoration: none;
      font-size: 0.85rem;
    }
    a:hover { text-decoration: underline; }
    footer {
      margin-top: 32px;
      font-size: 0.8rem;
      color: var(--text-muted);
      text-align: center;
    }
`;

/**
 * Sections for every non-empty subject, in subject order.
 */
export function renderSubjectSections(
  buckets: ClassifiedBuckets,
  indent = '    '
): string {
  const parts: string[] = [];

  for (const subject of SUBJECT_ORDER) {
    const articles = buckets[subject];
    if (articles.length === 0) continue;

    parts.push(`${indent}<section class="subject">\n`);
    parts.push(`${indent}  <h2>${escapeHtml(subject)}</h2>\n`);
    parts.push(`${indent}  <p class="subject-description">${SUBJECT_DESCRIPTION}</p>\n`);

    for (const article of articles) {
      parts.push(renderArticleCard(article, `${indent}  `));
    }

    parts.push(`${indent}</section>\n`);
  }

  return parts.join('');
}

/**
 * Render the full newsletter document.
 */
export function renderNewsletterHtml(buckets: ClassifiedBuckets, generatedAt: Date): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>${NEWSLETTER_TITLE}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <link rel="preconnect" href="https://fonts.googleapis.com" />
  <link rel="preconnect" href="https://fonts.gstatic.com" crossorigin />
  <link href="https://fonts.googleapis.com/css2?family=Inter:wght@300;400;500;600;700&display=swap" rel="stylesheet" />
  <style>${NEWSLETTER_STYLES}  </style>
</head>
<body>
  <header>
    <div class="container">
      <h1>${NEWSLETTER_TITLE}</h1>
      <p>Dawn &amp; The Express Tribune • Key news and op-eds • Essay-focused subjects</p>
    </div>
  </header>
  <main class="container">
    <p class="date">Generated on ${formatGeneratedDate(generatedAt)} (for personal reading / CSS prep)</p>
${renderSubjectSections(buckets)}  </main>
  <footer>
    Curated automatically from public RSS feeds of Dawn &amp; The Express Tribune for personal study use.
  </footer>
</body>
</html>
`;
}
