/**
 * Current Affairs Digest — Configuration
 *
 * Reads runtime settings from the environment (and `.env` via dotenv)
 * and validates them with zod. Feed URLs and the keyword table are
 * compiled-in and deliberately absent here.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { LogLevelSchema } from './logger';

// ============================================================
// SCHEMA
// ============================================================

export const DASHBOARD_MIN_ITEMS = 3;
export const DASHBOARD_MAX_ITEMS = 15;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; CurrentAffairsDigest/1.0; +https://example.com/digest)';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  NEWSLETTER_OUTPUT: z.string().min(1).default('newsletter.html'),
  NEWSLETTER_MAX_PER_SUBJECT: positiveInt(6),
  DASHBOARD_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DASHBOARD_DEFAULT_MAX: z.coerce
    .number()
    .int()
    .min(DASHBOARD_MIN_ITEMS)
    .max(DASHBOARD_MAX_ITEMS)
    .default(8),
  DASHBOARD_CACHE_TTL_SECONDS: positiveInt(900),
  FEED_TIMEOUT_MS: positiveInt(15000),
  FEED_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export interface AppConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  nodeEnv: 'development' | 'production' | 'test';
  newsletter: {
    outputFile: string;
    maxPerSubject: number;
  };
  dashboard: {
    port: number;
    defaultMaxPerSubject: number;
    cacheTtlMs: number;
  };
  feeds: {
    timeoutMs: number;
    userAgent: string;
  };
}

// ============================================================
// ERRORS
// ============================================================

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ============================================================
// LOADING
// ============================================================

/**
 * Build the application config from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return Object.freeze({
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
    newsletter: {
      outputFile: values.NEWSLETTER_OUTPUT,
      maxPerSubject: values.NEWSLETTER_MAX_PER_SUBJECT,
    },
    dashboard: {
      port: values.DASHBOARD_PORT,
      defaultMaxPerSubject: values.DASHBOARD_DEFAULT_MAX,
      cacheTtlMs: values.DASHBOARD_CACHE_TTL_SECONDS * 1000,
    },
    feeds: {
      timeoutMs: values.FEED_TIMEOUT_MS,
      userAgent: values.FEED_USER_AGENT,
    },
  });
}

let cachedConfig: AppConfig | undefined;

/**
 * Process-wide config, loading `.env` on first use.
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    loadDotenv();
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
