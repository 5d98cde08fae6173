import { createHash, timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';

/** Routes reachable without the API key: liveness and token-authorised downloads. */
export function isPublicPath(path: string): boolean {
  return path === '/healthz' || path.startsWith('/download/');
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Bearer token auth middleware.
 * Skips public paths. Returns 401 on missing/invalid token.
 */
export function bearerAuth(apiKey: string): MiddlewareHandler {
  const expected = digest(apiKey);

  return async (c, next) => {
    if (isPublicPath(c.req.path)) {
      return next();
    }

    const header = c.req.header('Authorization');
    if (!header) {
      return c.json({ error: 'Missing Authorization header', code: 'UNAUTHORIZED' }, 401);
    }

    const token = header.replace(/^Bearer\s+/i, '');
    if (!timingSafeEqual(digest(token), expected)) {
      return c.json({ error: 'Invalid API key', code: 'UNAUTHORIZED' }, 401);
    }

    return next();
  };
}
