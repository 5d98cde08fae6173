import { describe, it, expect, afterEach } from 'vitest';
import { API_KEY, createTestServer, json } from './test-fixtures.js';
import type { TestServer } from './test-fixtures.js';

describe('createServer', () => {
  let server: TestServer;

  afterEach(async () => {
    await server.close();
  });

  it('health check returns 200 with status ok', async () => {
    server = await createTestServer();
    const res = await server.app.request('/healthz');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', timestamp: '2024-05-01T10:00:00.000Z' });
  });

  it('requires the API key on management routes only', async () => {
    server = await createTestServer({ apiKey: API_KEY });

    expect((await server.app.request('/healthz')).status).toBe(200);
    expect((await server.app.request('/companies/acme/documents/inv-1/pdf', json({}))).status).toBe(401);
    expect((await server.app.request('/maintenance/sweep', json({}))).status).toBe(401);

    const authed = await server.app.request(
      '/companies/acme/documents/inv-1/pdf',
      json({}, { Authorization: `Bearer ${API_KEY}` }),
    );
    expect(authed.status).toBe(201);

    const download = await server.app.request('/download/unknown-token');
    expect(download.status).toBe(404);
  });

  it('returns JSON for unknown routes', async () => {
    server = await createTestServer();
    const res = await server.app.request('/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Route not found', code: 'ROUTE_NOT_FOUND' });
  });
});
