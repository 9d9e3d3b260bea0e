/**
 * Current Affairs Digest — Dashboard Server
 *
 * Express server for the interactive dashboard.
 *
 * Endpoints:
 * - GET  /              — Dashboard page (?max=3..15&subject=...)
 * - POST /refresh       — Drop cached classification and redirect back
 * - GET  /api/articles  — Same data as JSON
 * - GET  /health        — Health check for monitoring
 *
 * Run with: npm run dashboard
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { SUBJECT_ORDER, SubjectSchema } from '../types';
import type { Subject } from '../types';
import { fetchArticles } from '../feeds';
import type { FeedReader } from '../feeds';
import { renderDashboard } from '../delivery/dashboard';
import { DASHBOARD_MAX_ITEMS, DASHBOARD_MIN_ITEMS, getConfig } from '../lib/config';
import type { AppConfig } from '../lib/config';
import { logger, errorMessage } from '../lib/logger';
import { ClassificationCache } from './cache';

// ============================================================
// REQUEST PARSING
// ============================================================

const DashboardQuerySchema = z.object({
  max: z.coerce.number().int().min(DASHBOARD_MIN_ITEMS).max(DASHBOARD_MAX_ITEMS).optional(),
  subject: z.union([SubjectSchema, z.array(SubjectSchema)]).optional(),
});

const RefreshBodySchema = z.object({
  returnTo: z.string().regex(/^\?\S*$/).optional(),
});

export interface DashboardSettings {
  maxPerSubject: number;
  subjects: Subject[];
}

/**
 * Resolve query parameters to settings, or an error message.
 * Subjects come back in display order regardless of query order.
 */
export function parseDashboardQuery(
  query: unknown,
  defaultMax: number
): { ok: true; settings: DashboardSettings } | { ok: false; error: string } {
  const parsed = DashboardQuerySchema.safeParse(query);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map(i => `${i.path.join('.') || 'query'}: ${i.message}`).join('; '),
    };
  }

  const { max, subject } = parsed.data;
  const requested = subject === undefined ? SUBJECT_ORDER : [subject].flat();

  return {
    ok: true,
    settings: {
      maxPerSubject: max ?? defaultMax,
      subjects: SUBJECT_ORDER.filter(s => requested.includes(s)),
    },
  };
}

function queryString(req: Request): string {
  const index = req.originalUrl.indexOf('?');
  return index >= 0 ? req.originalUrl.slice(index) : '';
}

// ============================================================
// EXPRESS APP
// ============================================================

export interface DashboardDeps {
  cache: ClassificationCache;
  defaultMaxPerSubject: number;
}

export function createDashboardApp(deps: DashboardDeps): express.Express {
  const app = express();

  app.use(express.urlencoded({ extended: false }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'current-affairs-dashboard',
      version: '1.0.0',
    });
  });

  app.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseDashboardQuery(req.query, deps.defaultMaxPerSubject);
      if (!query.ok) {
        res.status(400).type('text/plain').send(`Invalid settings: ${query.error}`);
        return;
      }

      const { maxPerSubject, subjects } = query.settings;
      const { result, cached } = await deps.cache.get(maxPerSubject);

      res.type('html').send(
        renderDashboard({
          buckets: result.buckets,
          selectedSubjects: subjects,
          maxPerSubject,
          fetchedAt: result.fetchedAt,
          cached,
          returnTo: queryString(req),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/articles', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseDashboardQuery(req.query, deps.defaultMaxPerSubject);
      if (!query.ok) {
        res.status(400).json({ error: query.error });
        return;
      }

      const { maxPerSubject, subjects } = query.settings;
      const { result, cached } = await deps.cache.get(maxPerSubject);

      res.json({
        generatedAt: result.fetchedAt,
        cached,
        maxPerSubject,
        subjects: subjects.map(subject => ({
          subject,
          articles: result.buckets[subject],
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/refresh', (req: Request, res: Response) => {
    deps.cache.invalidate();

    const body = RefreshBodySchema.safeParse(req.body);
    const returnTo = body.success ? body.data.returnTo ?? '' : '';

    logger.info('Manual refresh requested', { returnTo });
    res.redirect(303, `/${returnTo}`);
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in dashboard server', { error: errorMessage(err) });
    res.status(500).type('text/plain').send('Internal server error');
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export interface StartServerOptions {
  config?: AppConfig;
  reader?: FeedReader;
}

export function startServer(options: StartServerOptions = {}): Server {
  const config = options.config ?? getConfig();

  const cache = new ClassificationCache(
    maxPerSubject => fetchArticles({ maxPerSubject, reader: options.reader }),
    config.dashboard.cacheTtlMs
  );

  const app = createDashboardApp({
    cache,
    defaultMaxPerSubject: config.dashboard.defaultMaxPerSubject,
  });

  return app.listen(config.dashboard.port, () => {
    logger.info('Dashboard server listening', {
      url: `http://localhost:${config.dashboard.port}`,
      cacheTtlMs: config.dashboard.cacheTtlMs,
    });
  });
}
