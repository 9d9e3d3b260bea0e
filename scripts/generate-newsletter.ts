/**
 * Current Affairs Digest — Generate Newsletter Script
 *
 * Fetches Dawn and Express Tribune feeds, classifies articles by
 * subject and writes a static HTML newsletter.
 *
 * Usage:
 *   npm run newsletter                          # Writes newsletter.html
 *   npm run newsletter -- --output digest.html  # Different file
 *   npm run newsletter -- --max 10              # Articles per subject
 */

import 'dotenv/config';
import { generateNewsletter } from '../src/delivery';
import { getConfig } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';

interface NewsletterArgs {
  outputFile?: string;
  maxPerSubject?: number;
}

function parseArgs(): NewsletterArgs {
  const args = process.argv.slice(2);
  const options: NewsletterArgs = {};

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--output' && args[i + 1]) {
      options.outputFile = args[i + 1];
      i++;
    } else if (args[i] === '--max' && args[i + 1]) {
      options.maxPerSubject = parseInt(args[i + 1], 10);
      i++;
    }
  }

  return options;
}

async function main(): Promise<void> {
  try {
    const args = parseArgs();
    const config = getConfig();

    logger.info('Fetching feeds from Dawn & The Express Tribune...');

    const { outputPath, aggregation } = await generateNewsletter({
      outputFile: args.outputFile ?? config.newsletter.outputFile,
      maxPerSubject: args.maxPerSubject ?? config.newsletter.maxPerSubject,
    });

    if (aggregation.errors.length > 0) {
      logger.warn('Some feeds could not be read', { errors: aggregation.errors });
    }

    logger.info(`Wrote ${outputPath}`);
  } catch (error) {
    logger.error('Newsletter generation failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

void main();
