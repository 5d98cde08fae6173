import { describe, it, expect, afterEach } from 'vitest';
import { API_KEY, createTestServer, json, tokenOf } from '../test-fixtures.js';
import type { TestServer } from '../test-fixtures.js';

const PDF = '/companies/acme/documents/inv-1/pdf';

describe('download routes', () => {
  let server: TestServer;

  afterEach(async () => {
    await server.close();
  });

  async function issue(headers?: Record<string, string>): Promise<string> {
    const res = await server.app.request(PDF, json({}, headers));
    return tokenOf((await res.json()).downloadUrl);
  }

  it('serves the PDF once as an attachment', async () => {
    server = await createTestServer();
    const token = await issue();

    const res = await server.app.request(`/download/${token}`);

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('application/pdf');
    expect(res.headers.get('Content-Disposition')).toBe('attachment; filename="invoice_INV-0001.pdf"');
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    const bytes = Buffer.from(await res.arrayBuffer());
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(res.headers.get('Content-Length')).toBe(String(bytes.byteLength));

    const again = await server.app.request(`/download/${token}`);
    expect(again.status).toBe(410);
    expect(await again.json()).toEqual({ error: 'Download link has already been used', code: 'TOKEN_CONSUMED' });
  });

  it('returns 404 for unknown tokens', async () => {
    server = await createTestServer();

    const res = await server.app.request(`/download/${'A'.repeat(43)}`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Download link not found', code: 'TOKEN_NOT_FOUND' });
  });

  it('returns 410 for expired tokens', async () => {
    server = await createTestServer();
    const token = await issue();
    server.clock.advance(300_001);

    const res = await server.app.request(`/download/${token}`);

    expect(res.status).toBe(410);
    expect((await res.json()).code).toBe('TOKEN_EXPIRED');
  });

  it('needs no API key', async () => {
    server = await createTestServer({ apiKey: API_KEY });
    const token = await issue({ Authorization: `Bearer ${API_KEY}` });

    const res = await server.app.request(`/download/${token}`);
    expect(res.status).toBe(200);
  });

  it('moves a sent document to VIEWED', async () => {
    server = await createTestServer();
    await server.app.request('/companies/acme/documents/inv-1/send', json({}));
    const token = await issue();

    await server.app.request(`/download/${token}`, { headers: { 'X-Actor': 'client' } });

    expect((await server.db.getLifecycle('inv-1'))?.status).toBe('VIEWED');
  });

  it('rate limits download attempts per client', async () => {
    server = await createTestServer({ downloadRateLimit: { maxRequests: 1, windowMs: 60_000 } });
    const headers = { 'X-Forwarded-For': '203.0.113.7' };

    expect((await server.app.request('/download/first', { headers })).status).toBe(404);
    expect((await server.app.request('/download/second', { headers })).status).toBe(429);
  });
});
