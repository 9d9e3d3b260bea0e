/**
 * Current Affairs Digest — Delivery Module
 *
 * Static newsletter and interactive dashboard rendering.
 */

export { renderNewsletterHtml, renderSubjectSections, NEWSLETTER_TITLE } from './newsletter';
export { renderDashboard, DASHBOARD_TITLE, type DashboardView } from './dashboard';
export { escapeHtml, formatGeneratedDate, renderArticleCard } from './html';
export {
  writeNewsletter,
  generateNewsletter,
  type NewsletterOptions,
  type NewsletterResult,
} from './export';
