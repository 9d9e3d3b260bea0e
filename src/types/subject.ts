/**
 * Current Affairs Digest — Subject Types
 *
 * The nine editorial subjects articles are bucketed into.
 * Declaration order is significant: it decides which subject wins
 * when an article matches several, and it is the display order.
 */

import { z } from 'zod';

// ============================================================
// SUBJECT
// ============================================================

export const SubjectSchema = z.enum([
  'Economy',
  'Economic Issues and Reforms',
  'Agriculture',
  'Geopolitics',
  'National Security',
  'Foreign Policy',
  'Constitutional Law and Judiciary',
  'Gender',
  'Social Issues',
]);
export type Subject = z.infer<typeof SubjectSchema>;

export const SUBJECT_ORDER: readonly Subject[] = SubjectSchema.options;

// ============================================================
// KEYWORD TABLE
// ============================================================

const KeywordSchema = z
  .string()
  .min(1, 'Keyword cannot be empty')
  .refine(keyword => keyword === keyword.toLowerCase(), 'Keyword must be lowercase');

const KeywordListSchema = z.array(KeywordSchema).min(1, 'Subject needs at least one keyword');

export const KeywordTableSchema = z
  .object({
    Economy: KeywordListSchema,
    'Economic Issues and Reforms': KeywordListSchema,
    Agriculture: KeywordListSchema,
    Geopolitics: KeywordListSchema,
    'National Security': KeywordListSchema,
    'Foreign Policy': KeywordListSchema,
    'Constitutional Law and Judiciary': KeywordListSchema,
    Gender: KeywordListSchema,
    'Social Issues': KeywordListSchema,
  })
  .strict() satisfies z.ZodType<Record<Subject, string[]>>;

export type KeywordTable = Readonly<Record<Subject, readonly string[]>>;

/**
 * Build a record with one entry per subject.
 */
export function mapSubjects<T>(fn: (subject: Subject) => T): Record<Subject, T> {
  return {
    Economy: fn('Economy'),
    'Economic Issues and Reforms': fn('Economic Issues and Reforms'),
    Agriculture: fn('Agriculture'),
    Geopolitics: fn('Geopolitics'),
    'National Security': fn('National Security'),
    'Foreign Policy': fn('Foreign Policy'),
    'Constitutional Law and Judiciary': fn('Constitutional Law and Judiciary'),
    Gender: fn('Gender'),
    'Social Issues': fn('Social Issues'),
  };
}
