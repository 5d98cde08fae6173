import { Hono } from 'hono';
import type { BillingCore, Logger } from '@billvault/core';
import type { AppEnv } from '../types.js';
import {
  DocumentParams,
  GeneratePdfBody,
  LifecycleQuery,
  PaymentBody,
  PreviewQuery,
  SendBody,
  parseWith,
  readJsonBody,
} from '../schemas.js';

const DOCUMENT = '/:companyId/documents/:documentId';

/** Management routes, mounted under /companies. */
export function documentRoutes(core: BillingCore, logger: Logger) {
  const app = new Hono<AppEnv>();
  const { engine, lifecycle } = core;

  // POST /companies/:companyId/documents/:documentId/pdf
  app.post(`${DOCUMENT}/pdf`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    const body = parseWith(GeneratePdfBody, await readJsonBody(c));

    const link = await engine.generate(c.get('actor'), companyId, documentId, body);
    logger.info('Download link issued', { companyId, documentId, artifactId: link.artifactId });
    return c.json(link, 201);
  });

  // GET /companies/:companyId/documents/:documentId/preview?templateId=
  app.get(`${DOCUMENT}/preview`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    const { templateId } = parseWith(PreviewQuery, { templateId: c.req.query('templateId') || undefined });

    const html = await engine.preview(companyId, documentId, templateId);
    return c.html(html);
  });

  // POST /companies/:companyId/documents/:documentId/send
  app.post(`${DOCUMENT}/send`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    const { recipient } = parseWith(SendBody, await readJsonBody(c));

    const result = await lifecycle.lockForSend(c.get('actor'), companyId, documentId, recipient);
    logger.info('Document sent', { companyId, documentId, snapshotId: result.currentSnapshotId });
    return c.json(result);
  });

  // POST /companies/:companyId/documents/:documentId/view
  app.post(`${DOCUMENT}/view`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    return c.json(await lifecycle.clientView(c.get('actor'), companyId, documentId));
  });

  // POST /companies/:companyId/documents/:documentId/payments
  app.post(`${DOCUMENT}/payments`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    const { amount } = parseWith(PaymentBody, await readJsonBody(c));

    const result = await lifecycle.recordPayment(c.get('actor'), companyId, documentId, amount);
    logger.info('Payment recorded', { companyId, documentId, status: result.status });
    return c.json(result);
  });

  // POST /companies/:companyId/documents/:documentId/overdue
  app.post(`${DOCUMENT}/overdue`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    return c.json(await lifecycle.markOverdue(c.get('actor'), companyId, documentId));
  });

  // GET /companies/:companyId/documents/:documentId/lifecycle?since=
  app.get(`${DOCUMENT}/lifecycle`, async (c) => {
    const { companyId, documentId } = parseWith(DocumentParams, c.req.param());
    const { since } = parseWith(LifecycleQuery, { since: c.req.query('since') || undefined });

    return c.json(await engine.history(companyId, documentId, { since }));
  });

  return app;
}
