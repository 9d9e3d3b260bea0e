/**
 * Current Affairs Digest — Dashboard Renderer
 *
 * Server-rendered page for the interactive dashboard. Same content
 * model as the newsletter, plus a settings panel (subject filter,
 * items-per-subject range) and a manual refresh action.
 * No client framework: plain forms posting back to the server.
 */

import { mapSubjects, SUBJECT_ORDER } from '../types';
import type { ClassifiedBuckets, Subject } from '../types';
import { DASHBOARD_MAX_ITEMS, DASHBOARD_MIN_ITEMS } from '../lib/config';
import { escapeHtml } from './html';
import { renderSubjectSections } from './newsletter';

export const DASHBOARD_TITLE = 'CSS Current Affairs Dashboard';

export interface DashboardView {
  buckets: ClassifiedBuckets;
  selectedSubjects: readonly Subject[];
  maxPerSubject: number;
  /** When the shown data was fetched */
  fetchedAt: string;
  /** Whether the data came from the in-memory cache */
  cached: boolean;
  /** Query string the refresh action should return to ("" or "?...") */
  returnTo: string;
}

const DASHBOARD_STYLES = `
  *, *::before, *::after { box-sizing: border-box; }
  body {
    margin: 0;
    font-family: system-ui, -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
    background: #f5f7fb;
    color: #111827;
  }
  header { background: #035076; color: white; padding: 16px 24px; }
  header h1 { margin: 0; font-size: 1.5rem; font-weight: 600; }
  .layout { display: flex; gap: 24px; padding: 24px; align-items: flex-start; }
  .settings {
    flex: 0 0 260px;
    background: white; border: 1px solid #e5e7eb; border-radius: 10px; padding: 16px;
  }
  .settings h2 { margin: 0 0 12px; font-size: 1rem; }
  .settings label { display: block; font-size: 0.85rem; margin: 12px 0 4px; color: #374151; }
  .settings select { width: 100%; }
  .settings button { margin-top: 12px; width: 100%; padding: 6px; cursor: pointer; }
  .status { font-size: 0.8rem; color: #6b7280; margin: 0 0 16px; }
  .content { flex: 1; max-height: calc(100vh - 120px); overflow-y: auto; }
  .subject { margin-bottom: 24px; }
  .subject h2 { font-size: 1.15rem; color: #035076; border-left: 4px solid #035076; padding-left: 8px; }
  .subject-description { font-size: 0.85rem; color: #6b7280; }
  .item { background: white; border: 1px solid #e5e7eb; border-radius: 10px; padding: 10px 12px; margin-bottom: 8px; }
  .item h3 { margin: 0 0 4px; font-size: 0.95rem; }
  .meta { margin: 0 0 4px; font-size: 0.75rem; text-transform: uppercase; color: #6b7280; }
  .summary { margin: 0 0 6px; font-size: 0.88rem; }
  .empty { color: #6b7280; }
  a { color: #035076; font-size: 0.85rem; }
`;

function renderSubjectOptions(selected: readonly Subject[]): string {
  return SUBJECT_ORDER.map(subject => {
    const attr = selected.includes(subject) ? ' selected' : '';
    return `          <option value="${escapeHtml(subject)}"${attr}>${escapeHtml(subject)}</option>\n`;
  }).join('');
}

/**
 * Render the dashboard page.
 */
export function renderDashboard(view: DashboardView): string {
  const visible = mapSubjects(subject =>
    view.selectedSubjects.includes(subject) ? view.buckets[subject] : []
  );
  const sections = renderSubjectSections(visible, '      ');
  const content = sections || '      <p class="empty">No articles matched the selected subjects.</p>\n';
  const source = view.cached ? 'served from cache' : 'freshly fetched';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>${DASHBOARD_TITLE}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <style>${DASHBOARD_STYLES}</style>
</head>
<body>
  <header>
    <h1>${DASHBOARD_TITLE}</h1>
  </header>
  <div class="layout">
    <aside class="settings">
      <h2>Settings</h2>
      <form method="get" action="/">
        <label for="max">Max articles per subject: <output id="max-value">${view.maxPerSubject}</output></label>
        <input type="range" id="max" name="max" min="${DASHBOARD_MIN_ITEMS}" max="${DASHBOARD_MAX_ITEMS}" step="1" value="${view.maxPerSubject}"
          oninput="document.getElementById('max-value').value = this.value" />
        <label for="subject">Subjects to show</label>
        <select id="subject" name="subject" multiple size="${SUBJECT_ORDER.length}">
${renderSubjectOptions(view.selectedSubjects)}        </select>
        <button type="submit">Apply</button>
      </form>
      <form method="post" action="/refresh">
        <input type="hidden" name="returnTo" value="${escapeHtml(view.returnTo)}" />
        <button type="submit">Refresh feeds</button>
      </form>
    </aside>
    <main class="content">
      <p class="status">Last fetched ${escapeHtml(view.fetchedAt)} (${source})</p>
${content}    </main>
  </div>
</body>
</html>
`;
}
