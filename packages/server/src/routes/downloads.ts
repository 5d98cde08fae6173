import { Hono } from 'hono';
import type { BillingCore, Logger } from '@billvault/core';
import type { AppEnv } from '../types.js';

/** Public download route, mounted under /download. The token is the only authorisation. */
export function downloadRoutes(core: BillingCore, logger: Logger) {
  const app = new Hono<AppEnv>();

  // GET /download/:token
  app.get('/:token', async (c) => {
    const { bytes, filename, contentType } = await core.engine.download(c.get('actor'), c.req.param('token'));
    logger.debug('Artifact downloaded', { filename, byteSize: bytes.byteLength });

    c.header('Content-Type', contentType);
    c.header('Content-Disposition', `attachment; filename="${filename}"`);
    c.header('Content-Length', String(bytes.byteLength));
    c.header('Cache-Control', 'no-store');
    c.header('Referrer-Policy', 'no-referrer');
    return c.body(new Uint8Array(bytes));
  });

  return app;
}
