import type { Context, MiddlewareHandler } from 'hono';

export interface RateLimitConfig {
  /** Max requests per window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

/** First hop of X-Forwarded-For, or a shared bucket when absent. */
export function clientKey(c: Context): string {
  const forwarded = c.req.header('X-Forwarded-For')?.split(',')[0]?.trim();
  return forwarded || c.req.header('X-Real-IP') || 'anonymous';
}

/**
 * Per-client fixed window rate limiter.
 * Uses in-memory storage (suitable for single-instance deployments).
 */
export function rateLimitMiddleware(
  config: RateLimitConfig,
  keyOf: (c: Context) => string = clientKey,
): MiddlewareHandler {
  const windows = new Map<string, WindowEntry>();

  // Periodic cleanup of expired entries
  setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of windows) {
      if (entry.resetAt < now) {
        windows.delete(key);
      }
    }
  }, 60_000).unref();

  return async (c, next) => {
    const key = keyOf(c);
    const now = Date.now();
    let entry = windows.get(key);

    if (!entry || entry.resetAt < now) {
      entry = { count: 0, resetAt: now + config.windowMs };
      windows.set(key, entry);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(config.maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, config.maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count > config.maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'Rate limit exceeded', code: 'RATE_LIMITED', retryAfter }, 429);
    }

    await next();
  };
}
