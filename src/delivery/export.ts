/**
 * Current Affairs Digest — Newsletter Export
 *
 * Writes the rendered newsletter to disk and wires the
 * fetch → render → write run used by the CLI.
 */

import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { fetchArticles } from '../feeds';
import type { AggregationResult, FeedReader } from '../feeds';
import type { FeedSourceConfig } from '../types';
import { getConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { renderNewsletterHtml } from './newsletter';

export interface NewsletterOptions {
  outputFile?: string;
  maxPerSubject?: number;
  feeds?: readonly FeedSourceConfig[];
  reader?: FeedReader;
  /** Timestamp printed in the document (default: now) */
  generatedAt?: Date;
}

export interface NewsletterResult {
  outputPath: string;
  bytes: number;
  aggregation: AggregationResult;
}

/**
 * Write HTML as UTF-8, replacing any previous file.
 * Returns the absolute path written.
 */
export async function writeNewsletter(
  html: string,
  outputFile: string = getConfig().newsletter.outputFile
): Promise<string> {
  const outputPath = resolve(outputFile);
  await writeFile(outputPath, html, { encoding: 'utf-8' });
  return outputPath;
}

/**
 * Fetch, classify, render and write the static newsletter.
 */
export async function generateNewsletter(
  options: NewsletterOptions = {}
): Promise<NewsletterResult> {
  const outputFile = options.outputFile ?? getConfig().newsletter.outputFile;
  const maxPerSubject = options.maxPerSubject ?? getConfig().newsletter.maxPerSubject;

  const aggregation = await fetchArticles({
    maxPerSubject,
    feeds: options.feeds,
    reader: options.reader,
  });

  const html = renderNewsletterHtml(aggregation.buckets, options.generatedAt ?? new Date());
  const outputPath = await writeNewsletter(html, outputFile);
  const bytes = Buffer.byteLength(html, 'utf-8');

  logger.info('Newsletter written', { outputPath, bytes, errors: aggregation.errors.length });

  return { outputPath, bytes, aggregation };
}
