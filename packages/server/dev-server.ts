/**
 * Dev server: starts the API on PORT (default 3456) with a seeded in-memory
 * document repository. Reads config from the repo root .env file.
 *
 * Started by `npm run dev`.
 */

import { readFileSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import {
  InMemoryDocumentRepository,
  SQLiteAdapter,
  SYSTEM_ACTOR,
  createBillingCore,
  createConsoleLogger,
  errorMessage,
  nextDocumentNumber,
} from '@billvault/core';
import { createServer } from './src/app.js';
import { getServerConfig } from './src/config.js';

const rootDir = resolve(dirname(fileURLToPath(import.meta.url)), '../..');

// Load .env from repo root
function loadEnvFile(path: string): void {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    throw error;
  }
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim().replace(/^["']|["']$/g, '');
    if (!process.env[key]) process.env[key] = value;
  }
}

function seedRepository(): InMemoryDocumentRepository {
  const companyId = 'demo';
  return new InMemoryDocumentRepository({
    branding: [
      {
        companyId,
        companyName: 'Demo Studio',
        addressLines: ['12 Harbour Road', 'Portsmouth'],
        email: 'accounts@demo.test',
        primaryColor: '#2B6CB0',
        accentColor: '#ED8936',
        fontFamily: 'Helvetica',
      },
    ],
    documents: [
      {
        id: 'inv-demo-1',
        companyId,
        kind: 'invoice',
        number: nextDocumentNumber('invoice', null),
        currency: 'EUR',
        taxRate: '21',
        issueDate: '2024-05-01',
        dueDate: '2024-05-31',
        client: { name: 'Northwind Traders', email: 'ap@northwind.test' },
        lineItems: [
          { description: 'Design sprint', quantity: '3', unitPrice: '450.00' },
          { description: 'Hosting (May)', quantity: '1', unitPrice: '39.90', discount: '4.90' },
        ],
        notes: 'Payment within 30 days.',
      },
      {
        id: 'quo-demo-1',
        companyId,
        kind: 'quote',
        number: nextDocumentNumber('quote', null),
        currency: 'EUR',
        taxRate: '21',
        issueDate: '2024-05-02',
        client: { name: 'Contoso' },
        lineItems: [{ description: 'Brand refresh', quantity: '1', unitPrice: '2400' }],
      },
    ],
  });
}

async function main() {
  loadEnvFile(resolve(rootDir, '.env'));
  const config = getServerConfig();
  const logger = createConsoleLogger('dev-server');

  // File-based SQLite so data persists across dev server restarts
  const dbPath = resolve(rootDir, config.databasePath);
  const artifactRoot = resolve(rootDir, config.artifactRoot);
  mkdirSync(dirname(dbPath), { recursive: true });
  mkdirSync(artifactRoot, { recursive: true });
  logger.info('Storage ready', { dbPath, artifactRoot });

  const db = new SQLiteAdapter(dbPath);
  await db.migrate();

  const core = createBillingCore({
    db,
    repository: seedRepository(),
    artifactRoot,
    publicBaseUrl: config.publicBaseUrl,
    defaultTemplate: config.defaultTemplate,
    downloadTtlSeconds: config.downloadTtlSeconds,
    consumedGraceSeconds: config.consumedGraceSeconds,
    renderTimeoutMs: config.renderTimeoutMs,
    readDrainMs: config.readDrainMs,
    auditRetentionDays: config.auditRetentionDays,
    notifier: {
      onDocumentSent: (event) => logger.info('document.sent', { ...event }),
    },
    logger,
  });

  const app = createServer({
    core,
    apiKey: config.apiKey,
    logger,
    downloadRateLimit: { maxRequests: config.downloadRateLimit, windowMs: config.downloadRateWindowMs },
  });

  // Periodic maintenance: sweep reclaimable artifacts, then mark overdue documents
  const intervalMs = config.sweepIntervalSeconds * 1000;
  setInterval(() => {
    core.sweeper
      .sweep(SYSTEM_ACTOR, new Date())
      .then(() => core.lifecycle.runOverdueCheck(SYSTEM_ACTOR, new Date()))
      .catch((error: unknown) => {
        logger.error('Maintenance run failed', { error: errorMessage(error) });
      });
  }, intervalMs).unref();

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`API server running on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
