import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';

export const ANONYMOUS_ACTOR = 'anonymous';

const MAX_ACTOR_LENGTH = 128;

/** Records the X-Actor header as the acting identity for audit entries. */
export function actorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header('X-Actor')?.trim() ?? '';
    c.set('actor', header ? header.slice(0, MAX_ACTOR_LENGTH) : ANONYMOUS_ACTOR);
    await next();
  };
}
