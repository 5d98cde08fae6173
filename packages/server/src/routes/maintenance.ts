import { Hono } from 'hono';
import type { BillingCore, Logger } from '@billvault/core';
import type { AppEnv } from '../types.js';
import { SweepBody, parseWith, readJsonBody } from '../schemas.js';

/** Operator routes, mounted under /maintenance. */
export function maintenanceRoutes(core: BillingCore, logger: Logger, now: () => Date) {
  const app = new Hono<AppEnv>();

  // POST /maintenance/sweep
  app.post('/sweep', async (c) => {
    const { dryRun } = parseWith(SweepBody, await readJsonBody(c));
    const result = await core.sweeper.sweep(c.get('actor'), now(), { dryRun });
    logger.info('Manual sweep finished', { deleted: result.deleted, failed: result.failed, dryRun: result.dryRun });
    return c.json(result);
  });

  // POST /maintenance/overdue-check
  app.post('/overdue-check', async (c) => {
    const result = await core.lifecycle.runOverdueCheck(c.get('actor'), now());
    return c.json(result);
  });

  return app;
}
