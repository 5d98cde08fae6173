import { Hono } from 'hono';
import { noopLogger } from '@billvault/core';
import type { AppEnv, ServerOptions } from './types.js';
import { createErrorHandler } from './middleware/error.js';
import { bearerAuth } from './middleware/auth.js';
import { actorMiddleware } from './middleware/actor.js';
import { rateLimitMiddleware } from './middleware/rate-limit.js';
import { documentRoutes } from './routes/documents.js';
import { downloadRoutes } from './routes/downloads.js';
import { maintenanceRoutes } from './routes/maintenance.js';

/**
 * Create a fully configured Hono app around a billing core.
 * This is a library. Consumers mount the returned app in their own runtime.
 */
export function createServer(options: ServerOptions) {
  const { core, apiKey } = options;
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? (() => new Date());

  const app = new Hono<AppEnv>();

  // 1. Global error handler
  app.onError(createErrorHandler(logger));
  app.notFound((c) => c.json({ error: 'Route not found', code: 'ROUTE_NOT_FOUND' }, 404));

  // 2. Health endpoint (no auth)
  app.get('/healthz', (c) => {
    return c.json({ status: 'ok', timestamp: now().toISOString() });
  });

  // 3. Bearer auth (skips /healthz and /download/*), then the acting identity
  if (apiKey) {
    app.use('*', bearerAuth(apiKey));
  }
  app.use('*', actorMiddleware());

  // 4. Download rate limiting
  if (options.downloadRateLimit) {
    app.use('/download/*', rateLimitMiddleware(options.downloadRateLimit));
  }

  // 5. Mount route groups
  app.route('/companies', documentRoutes(core, logger));
  app.route('/download', downloadRoutes(core, logger));
  app.route('/maintenance', maintenanceRoutes(core, logger, now));

  return app;
}
