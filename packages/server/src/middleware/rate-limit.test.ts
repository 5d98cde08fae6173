import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { rateLimitMiddleware } from './rate-limit.js';

function createTestApp() {
  const app = new Hono();
  app.use('*', rateLimitMiddleware({ maxRequests: 2, windowMs: 60_000 }));
  app.get('/thing', (c) => c.json({ ok: true }));
  return app;
}

const from = (ip: string) => ({ headers: { 'X-Forwarded-For': `${ip}, 10.0.0.1` } });

describe('rateLimitMiddleware', () => {
  it('rejects requests beyond the limit with 429', async () => {
    const app = createTestApp();

    const first = await app.request('/thing', from('203.0.113.7'));
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect((await app.request('/thing', from('203.0.113.7'))).status).toBe(200);

    const third = await app.request('/thing', from('203.0.113.7'));
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('60');
    expect((await third.json()).code).toBe('RATE_LIMITED');
  });

  it('counts clients separately', async () => {
    const app = createTestApp();
    await app.request('/thing', from('203.0.113.7'));
    await app.request('/thing', from('203.0.113.7'));

    expect((await app.request('/thing', from('198.51.100.2'))).status).toBe(200);
  });
});
