import { describe, it, expect, beforeEach } from 'vitest';
import { SQLiteAdapter } from '../db/sqlite-adapter.js';
import { InMemoryDocumentRepository } from '../repository/memory.js';
import {
  DocumentNotFoundError,
  SnapshotNotFoundError,
  ValidationError,
} from '../errors/index.js';
import {
  COMPANY_ID,
  DOCUMENT_ID,
  OTHER_COMPANY_ID,
  makeBranding,
  makeClock,
  makeDocument,
} from '../test-fixtures.js';
import { SnapshotBuilder, buildSnapshot } from './builder.js';

describe('buildSnapshot', () => {
  const input = { id: 'snap-1', version: 1, createdAt: '2024-05-01T10:00:00.000Z' };

  it('computes line totals and rounded totals', () => {
    const snapshot = buildSnapshot(makeDocument(), makeBranding(), input);

    expect(snapshot.lineItems.map((l) => l.lineTotal)).toEqual(['100', '30']);
    expect(snapshot.subtotal).toBe('130.00');
    expect(snapshot.taxTotal).toBe('13.00');
    expect(snapshot.total).toBe('143.00');
  });

  it('rounds only at the subtotal and tax boundaries', () => {
    const snapshot = buildSnapshot(
      makeDocument({
        taxRate: '8.875',
        lineItems: [{ description: 'Widget', quantity: '3', unitPrice: '0.10' }],
      }),
      makeBranding(),
      input,
    );

    expect(snapshot.lineItems[0]).toEqual({
      position: 1,
      description: 'Widget',
      quantity: '3',
      unitPrice: '0.1',
      discount: '0',
      lineTotal: '0.3',
    });
    expect(snapshot.taxRate).toBe('8.875');
    expect(snapshot.subtotal).toBe('0.30');
    expect(snapshot.taxTotal).toBe('0.03');
    expect(snapshot.total).toBe('0.33');
  });

  it('copies branding at snapshot time', () => {
    const snapshot = buildSnapshot(makeDocument(), makeBranding(), input);
    expect(snapshot.branding).toEqual({
      companyName: 'Acme Billing Ltd',
      addressLines: ['1 Main Street', 'Springfield'],
      email: 'billing@acme.test',
      taxNumber: 'VAT-0001',
      primaryColor: '#6B46C1',
      accentColor: '#F6AD55',
      fontFamily: 'Helvetica',
      fontPath: null,
      logoPath: null,
    });
  });

  it('hashes content independently of id, version and timestamp', () => {
    const a = buildSnapshot(makeDocument(), makeBranding(), input);
    const b = buildSnapshot(makeDocument(), makeBranding(), {
      id: 'snap-2',
      version: 7,
      createdAt: '2025-01-01T00:00:00.000Z',
    });
    const c = buildSnapshot(makeDocument({ notes: 'Changed' }), makeBranding(), input);

    expect(a.contentHash).toBe(b.contentHash);
    expect(a.contentHash).not.toBe(c.contentHash);
  });

  it('rejects a discount larger than the line gross', () => {
    const document = makeDocument({
      lineItems: [{ description: 'Widget', quantity: '1', unitPrice: '10', discount: '10.01' }],
    });

    try {
      buildSnapshot(document, makeBranding(), input);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual(['lineItems[0].discount: exceeds the line gross amount']);
      }
    }
  });

  it('collects every issue', () => {
    const document = makeDocument({
      currency: 'usd',
      taxRate: '120',
      lineItems: [{ description: ' ', quantity: '-1', unitPrice: 'abc' }],
    });

    try {
      buildSnapshot(document, makeBranding(), input);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([
          'currency: must be a three-letter ISO code',
          'taxRate: must not exceed 100',
          'lineItems[0].description: is required',
          'lineItems[0].quantity: must not be negative',
          'lineItems[0].unitPrice: must be a decimal number',
        ]);
      }
    }
  });

  it('requires at least one line item', () => {
    expect(() =>
      buildSnapshot(makeDocument({ lineItems: [] }), makeBranding(), input),
    ).toThrow(ValidationError);
  });

  it('accepts finite numbers and rejects non-finite ones', () => {
    const ok = buildSnapshot(
      makeDocument({ lineItems: [{ description: 'A', quantity: 2, unitPrice: 1.5 }] }),
      makeBranding(),
      input,
    );
    expect(ok.subtotal).toBe('3.00');

    expect(() =>
      buildSnapshot(
        makeDocument({ lineItems: [{ description: 'A', quantity: Infinity, unitPrice: 1 }] }),
        makeBranding(),
        input,
      ),
    ).toThrow(ValidationError);
  });
});

describe('SnapshotBuilder', () => {
  let db: SQLiteAdapter;
  let repository: InMemoryDocumentRepository;
  let builder: SnapshotBuilder;

  beforeEach(async () => {
    db = new SQLiteAdapter(':memory:');
    await db.migrate();
    repository = new InMemoryDocumentRepository({
      documents: [makeDocument()],
      branding: [makeBranding()],
    });
    builder = new SnapshotBuilder(db, repository, { now: makeClock().now });
  });

  it('creates version 1 and points the lifecycle at it', async () => {
    const snapshot = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);

    expect(snapshot.version).toBe(1);
    const lifecycle = await db.getLifecycle(DOCUMENT_ID);
    expect(lifecycle?.status).toBe('DRAFT');
    expect(lifecycle?.currentSnapshotId).toBe(snapshot.id);

    const audit = await db.getAuditEntries(DOCUMENT_ID);
    expect(audit).toHaveLength(1);
    expect(audit[0]?.action).toBe('snapshot_locked');
    expect(audit[0]?.actor).toBe('alice');
  });

  it('returns the current snapshot when the content is unchanged', async () => {
    const first = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    const second = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);

    expect(second.id).toBe(first.id);
    expect(await db.getSnapshots(DOCUMENT_ID)).toHaveLength(1);
  });

  it('creates a new version when a draft is edited', async () => {
    const first = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    repository.updateDocument(COMPANY_ID, DOCUMENT_ID, (doc) => {
      doc.lineItems.push({ description: 'Support', quantity: '1', unitPrice: '20' });
    });

    const second = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);

    expect(second.version).toBe(2);
    expect(second.total).toBe('165.00');
    expect((await db.getLifecycle(DOCUMENT_ID))?.currentSnapshotId).toBe(second.id);
    expect((await db.getSnapshot(first.id))?.total).toBe('143.00');
  });

  it('ignores live edits once the document has left DRAFT', async () => {
    const locked = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    await db.transitionLifecycle(
      DOCUMENT_ID,
      'DRAFT',
      { status: 'SENT', updatedAt: '2024-05-01T10:00:00.000Z' },
      {
        id: 'audit-send',
        actor: 'alice',
        action: 'lock_for_send',
        companyId: COMPANY_ID,
        documentId: DOCUMENT_ID,
        details: {},
        createdAt: '2024-05-01T10:00:00.000Z',
      },
    );

    repository.updateDocument(COMPANY_ID, DOCUMENT_ID, (doc) => {
      doc.lineItems = [{ description: 'Changed', quantity: '1', unitPrice: '1' }];
    });
    repository.updateBranding(COMPANY_ID, (profile) => {
      profile.companyName = 'Renamed Inc';
    });

    const again = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    expect(again.id).toBe(locked.id);
    expect(again.total).toBe('143.00');
    expect(again.branding.companyName).toBe('Acme Billing Ltd');
  });

  it('returns a stored snapshot on regeneration', async () => {
    const first = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    repository.updateDocument(COMPANY_ID, DOCUMENT_ID, (doc) => {
      doc.notes = 'Revised';
    });
    await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);

    const regenerated = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID, {
      snapshotId: first.id,
    });
    expect(regenerated).toEqual(first);
  });

  it('rejects a snapshot id of another document', async () => {
    repository.saveDocument(makeDocument({ id: 'inv-2', number: 'INV-0002' }));
    const other = await builder.lock('alice', COMPANY_ID, 'inv-2');

    await expect(
      builder.lock('alice', COMPANY_ID, DOCUMENT_ID, { snapshotId: other.id }),
    ).rejects.toThrow(SnapshotNotFoundError);
  });

  it('scopes documents by company', async () => {
    await expect(builder.lock('mallory', OTHER_COMPANY_ID, DOCUMENT_ID)).rejects.toThrow(
      DocumentNotFoundError,
    );
  });

  it('fails validation without a branding profile', async () => {
    repository.saveDocument(makeDocument({ id: 'orphan', companyId: OTHER_COMPANY_ID }));

    await expect(builder.lock('alice', OTHER_COMPANY_ID, 'orphan')).rejects.toThrow(
      ValidationError,
    );
  });

  it('leaves no snapshot behind on a validation failure', async () => {
    repository.updateDocument(COMPANY_ID, DOCUMENT_ID, (doc) => {
      doc.lineItems = [];
    });

    await expect(builder.lock('alice', COMPANY_ID, DOCUMENT_ID)).rejects.toThrow(ValidationError);
    expect(await db.getSnapshots(DOCUMENT_ID)).toEqual([]);
  });

  it('yields exactly one snapshot for concurrent locks', async () => {
    const [a, b] = await Promise.all([
      builder.lock('alice', COMPANY_ID, DOCUMENT_ID),
      builder.lock('bob', COMPANY_ID, DOCUMENT_ID),
    ]);

    expect(a.id).toBe(b.id);
    expect(await db.getSnapshots(DOCUMENT_ID)).toHaveLength(1);
    const audit = await db.getAuditEntries(DOCUMENT_ID);
    expect(audit.filter((e) => e.action === 'snapshot_locked')).toHaveLength(1);
  });

  it('reports the current snapshot without locking', async () => {
    expect(await builder.current(COMPANY_ID, DOCUMENT_ID)).toBeNull();
    const locked = await builder.lock('alice', COMPANY_ID, DOCUMENT_ID);
    expect((await builder.current(COMPANY_ID, DOCUMENT_ID))?.id).toBe(locked.id);
    expect(await builder.current(OTHER_COMPANY_ID, DOCUMENT_ID)).toBeNull();
  });
});
