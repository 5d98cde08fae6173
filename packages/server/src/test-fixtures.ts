import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  InMemoryDocumentRepository,
  SQLiteAdapter,
  createBillingCore,
} from '@billvault/core';
import type { BillingDocument, CompanyBranding } from '@billvault/core';
import { createServer } from './app.js';
import type { ServerOptions } from './types.js';

export const COMPANY_ID = 'acme';
export const DOCUMENT_ID = 'inv-1';
export const API_KEY = 'test-secret';

export function makeDocument(overrides?: Partial<BillingDocument>): BillingDocument {
  return {
    id: DOCUMENT_ID,
    companyId: COMPANY_ID,
    kind: 'invoice',
    number: 'INV-0001',
    currency: 'USD',
    taxRate: '10',
    issueDate: '2024-05-01',
    dueDate: '2024-05-31',
    client: { name: 'Wayne Enterprises', email: 'ap@wayne.test' },
    lineItems: [
      { description: 'Consulting', quantity: '2', unitPrice: '50.00' },
      { description: 'Hosting', quantity: '1', unitPrice: '30.00' },
    ],
    ...overrides,
  };
}

export function makeBranding(overrides?: Partial<CompanyBranding>): CompanyBranding {
  return {
    companyId: COMPANY_ID,
    companyName: 'Acme Billing Ltd',
    addressLines: ['1 Main Street'],
    primaryColor: '#6B46C1',
    accentColor: '#F6AD55',
    fontFamily: 'Helvetica',
    ...overrides,
  };
}

/** Mutable clock shared by the core and the server. */
export function makeClock(start = '2024-05-01T10:00:00.000Z') {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
    set(iso: string) {
      current = new Date(iso);
    },
  };
}

/** A server over an in-memory database and a temporary artifact root. */
export async function createTestServer(options?: Omit<ServerOptions, 'core' | 'now'>) {
  const root = await mkdtemp(join(tmpdir(), 'billvault-server-'));
  const db = new SQLiteAdapter(':memory:');
  await db.migrate();
  const repository = new InMemoryDocumentRepository({
    documents: [makeDocument()],
    branding: [makeBranding()],
  });
  const clock = makeClock();
  const core = createBillingCore({
    db,
    repository,
    artifactRoot: root,
    publicBaseUrl: 'http://billing.test',
    scheduleReclaims: false,
    now: clock.now,
  });
  const app = createServer({ ...options, core, now: clock.now });

  return {
    app,
    db,
    repository,
    core,
    clock,
    async close() {
      db.close();
      await rm(root, { recursive: true, force: true });
    },
  };
}

export type TestServer = Awaited<ReturnType<typeof createTestServer>>;

export function json(body: unknown, headers?: Record<string, string>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

/** Token part of a download URL. */
export function tokenOf(downloadUrl: string): string {
  return downloadUrl.slice(downloadUrl.lastIndexOf('/') + 1);
}
