/**
 * Current Affairs Digest — Type Exports
 */

export type { Subject, KeywordTable } from './subject';
export { SubjectSchema, KeywordTableSchema, SUBJECT_ORDER, mapSubjects } from './subject';

export type { FeedEntry, FeedSourceConfig, Article, ClassifiedBuckets } from './article';
