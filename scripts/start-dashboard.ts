/**
 * Current Affairs Digest — Dashboard Server Script
 *
 * Usage:
 *   npm run dashboard
 *   DASHBOARD_PORT=4000 npm run dashboard
 */

import 'dotenv/config';
import { startServer } from '../src/server/dashboard';
import { getConfig } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';

try {
  startServer({ config: getConfig() });
} catch (error) {
  logger.error('Dashboard failed to start', { error: errorMessage(error) });
  process.exit(1);
}
