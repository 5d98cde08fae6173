import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestServer, json, makeDocument } from '../test-fixtures.js';
import type { TestServer } from '../test-fixtures.js';

describe('maintenance routes', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await createTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it('POST /sweep reclaims expired artifacts', async () => {
    const generated = await server.app.request('/companies/acme/documents/inv-1/pdf', json({}));
    const { artifactId } = await generated.json();
    server.clock.advance(301_000);

    const dryRun = await server.app.request('/maintenance/sweep', json({ dryRun: true }));
    expect(await dryRun.json()).toEqual({
      deleted: 0,
      purgedCredentials: 0,
      failed: 0,
      dryRun: true,
      candidates: [artifactId],
    });

    const res = await server.app.request('/maintenance/sweep', json({}, { 'X-Actor': 'ops' }));
    expect(await res.json()).toEqual({
      deleted: 1,
      purgedCredentials: 1,
      failed: 0,
      dryRun: false,
      candidates: [artifactId],
    });

    const audit = await server.db.getAuditEntries('inv-1');
    expect(audit.at(-1)).toMatchObject({
      actor: 'ops',
      action: 'artifact_reclaimed',
      details: { artifactId, reason: 'expired' },
    });
  });

  it('POST /sweep rejects a non-boolean dryRun', async () => {
    const res = await server.app.request('/maintenance/sweep', json({ dryRun: 'yes' }));
    expect(res.status).toBe(400);
  });

  it('POST /overdue-check marks past-due documents', async () => {
    server.repository.saveDocument(makeDocument({ id: 'inv-2', number: 'INV-0002', dueDate: '2024-06-30' }));
    await server.app.request('/companies/acme/documents/inv-1/send', json({}));
    await server.app.request('/companies/acme/documents/inv-2/send', json({}));
    server.clock.set('2024-06-01T08:00:00.000Z');

    const res = await server.app.request('/maintenance/overdue-check', { method: 'POST' });

    expect(await res.json()).toEqual({ checked: 2, markedOverdue: ['inv-1'], failed: 0 });
  });
});
