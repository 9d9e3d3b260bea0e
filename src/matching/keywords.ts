/**
 * Current Affairs Digest — Subject Keyword Table
 *
 * Loads the compiled-in keyword table and validates it once at import.
 * A malformed table is a build defect, so it fails loudly here.
 */

import rawTable from './subject-keywords.json';
import { KeywordTableSchema, SUBJECT_ORDER } from '../types';
import type { KeywordTable } from '../types';

/**
 * Validate and freeze a keyword table.
 */
export function parseKeywordTable(input: unknown): KeywordTable {
  const table = KeywordTableSchema.parse(input);

  for (const subject of SUBJECT_ORDER) {
    Object.freeze(table[subject]);
  }

  return Object.freeze(table);
}

export const SUBJECT_KEYWORDS: KeywordTable = parseKeywordTable(rawTable);
