/**
 * Current Affairs Digest — Matching Module
 *
 * Keyword-based subject classification.
 */

export { SUBJECT_KEYWORDS, parseKeywordTable } from './keywords';
export { buildBlob, findMatch, classifySubject, type SubjectMatch } from './classifier';
