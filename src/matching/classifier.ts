/**
 * Current Affairs Digest — Subject Classifier
 *
 * Ordered keyword lookup over title + summary.
 * First subject (in SUBJECT_ORDER) with any keyword present as a
 * literal substring wins. No scoring, no tie-breaking.
 */

import { SUBJECT_ORDER } from '../types';
import type { KeywordTable, Subject } from '../types';
import { SUBJECT_KEYWORDS } from './keywords';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'classifier' });

export interface SubjectMatch {
  subject: Subject;
  keyword: string;
}

/**
 * Lowercased match target for an article.
 */
export function buildBlob(title: string, summary: string): string {
  return `${title} ${summary}`.toLowerCase();
}

/**
 * Find the winning subject and the keyword that selected it.
 */
export function findMatch(
  title: string,
  summary: string,
  table: KeywordTable = SUBJECT_KEYWORDS,
  order: readonly Subject[] = SUBJECT_ORDER
): SubjectMatch | null {
  const blob = buildBlob(title, summary);

  for (const subject of order) {
    for (const keyword of table[subject]) {
      if (blob.includes(keyword.toLowerCase())) {
        return { subject, keyword };
      }
    }
  }

  return null;
}

/**
 * Classify an article into at most one subject.
 */
export function classifySubject(
  title: string,
  summary: string,
  table: KeywordTable = SUBJECT_KEYWORDS,
  order: readonly Subject[] = SUBJECT_ORDER
): Subject | null {
  const match = findMatch(title, summary, table, order);

  if (match) {
    log.debug('Subject matched', { title, subject: match.subject, keyword: match.keyword });
  }

  return match?.subject ?? null;
}
