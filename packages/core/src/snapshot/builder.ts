import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../types/database.js';
import type { BillingDocument, CompanyBranding, DocumentRepository } from '../types/document.js';
import type { BrandingSnapshot, DocumentSnapshot, SnapshotLineItem } from '../types/snapshot.js';
import type { AuditEntry, DocumentLifecycle } from '../types/lifecycle.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';
import { contentHash } from '../utils/hash.js';
import {
  DocumentNotFoundError,
  IntegrityError,
  SnapshotNotFoundError,
  ValidationError,
} from '../errors/index.js';
import { computeTotals, exactString, formatAmount } from './money.js';
import { validateDocument } from './validation.js';

export interface SnapshotBuilderOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface LockOptions {
  /** Regeneration: return this stored snapshot instead of the current one */
  snapshotId?: string;
}

export interface BuildSnapshotInput {
  id: string;
  version: number;
  createdAt: string;
}

export function brandingSnapshot(branding: CompanyBranding): BrandingSnapshot {
  return {
    companyName: branding.companyName,
    addressLines: [...branding.addressLines],
    email: branding.email ?? null,
    taxNumber: branding.taxNumber ?? null,
    primaryColor: branding.primaryColor,
    accentColor: branding.accentColor,
    fontFamily: branding.fontFamily,
    fontPath: branding.fontPath ?? null,
    logoPath: branding.logoPath ?? null,
  };
}

/**
 * Freeze a document and its company's branding into a snapshot.
 * Pure apart from the ids and timestamp passed in.
 */
export function buildSnapshot(
  document: BillingDocument,
  branding: CompanyBranding,
  input: BuildSnapshotInput,
): DocumentSnapshot {
  const { lines, taxRate } = validateDocument(document);
  const totals = computeTotals(lines, taxRate);

  const lineItems: SnapshotLineItem[] = lines.map((line, index) => ({
    position: index + 1,
    description: line.description,
    quantity: exactString(line.quantity),
    unitPrice: exactString(line.unitPrice),
    discount: exactString(line.discount),
    lineTotal: exactString(totals.lineTotals[index] ?? line.quantity.times(line.unitPrice)),
  }));

  const content = {
    kind: document.kind,
    number: document.number.trim(),
    currency: document.currency,
    taxRate: exactString(taxRate),
    issueDate: document.issueDate,
    dueDate: document.dueDate ?? null,
    client: {
      name: document.client.name.trim(),
      email: document.client.email ?? null,
      address: document.client.address ?? null,
      taxNumber: document.client.taxNumber ?? null,
    },
    notes: document.notes ?? null,
    lineItems,
    branding: brandingSnapshot(branding),
    subtotal: formatAmount(totals.subtotal),
    taxTotal: formatAmount(totals.taxTotal),
    total: formatAmount(totals.total),
  };

  return {
    id: input.id,
    documentId: document.id,
    companyId: document.companyId,
    version: input.version,
    ...content,
    contentHash: contentHash(content),
    createdAt: input.createdAt,
  };
}

/**
 * Snapshot Builder. Locking a DRAFT document freezes its live data into a new
 * snapshot version; once the document has left DRAFT the stored snapshot is
 * returned as-is and live data is never consulted again.
 */
export class SnapshotBuilder {
  private readonly db: DatabaseAdapter;
  private readonly repository: DocumentRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(db: DatabaseAdapter, repository: DocumentRepository, options?: SnapshotBuilderOptions) {
    this.db = db;
    this.repository = repository;
    this.logger = options?.logger ?? noopLogger;
    this.now = options?.now ?? (() => new Date());
  }

  async lock(
    actor: string,
    companyId: string,
    documentId: string,
    options?: LockOptions,
  ): Promise<DocumentSnapshot> {
    const { document, lifecycle } = await this.loadDocument(companyId, documentId);

    if (options?.snapshotId) {
      const snapshot = await this.db.getSnapshot(options.snapshotId);
      if (!snapshot || snapshot.documentId !== documentId || snapshot.companyId !== companyId) {
        throw new SnapshotNotFoundError(options.snapshotId);
      }
      return snapshot;
    }

    const current = lifecycle.currentSnapshotId
      ? await this.db.getSnapshot(lifecycle.currentSnapshotId)
      : null;

    if (current && lifecycle.status !== 'DRAFT') {
      return current;
    }

    const branding = await this.repository.getCurrentCompanyBranding(companyId);
    if (!branding) {
      throw new ValidationError(`Company ${companyId} has no branding profile`, [
        'branding: company profile is not set up',
      ]);
    }

    const createdAt = this.now().toISOString();
    const candidate = buildSnapshot(document, branding, {
      id: randomUUID(),
      version: (current?.version ?? 0) + 1,
      createdAt,
    });

    if (current && current.contentHash === candidate.contentHash) {
      return current;
    }

    const audit: AuditEntry = {
      id: randomUUID(),
      actor,
      action: 'snapshot_locked',
      companyId,
      documentId,
      details: { snapshotId: candidate.id, version: candidate.version, total: candidate.total },
      createdAt,
    };

    // Throws IntegrityError if the document was sent or relocked meanwhile; a retry observes that
    const inserted = await this.db.insertSnapshotIfAbsent(candidate, audit, current?.id ?? null);
    if (inserted) {
      this.logger.info('Snapshot locked', {
        documentId,
        snapshotId: candidate.id,
        version: candidate.version,
      });
      return candidate;
    }

    // Lost the race for this version: observe the winner instead of writing a second one
    const winner = await this.db.getSnapshotByVersion(documentId, candidate.version);
    if (!winner) {
      throw new IntegrityError(
        `Concurrent lock on document ${documentId} version ${candidate.version} could not be resolved`,
      );
    }
    this.logger.debug('Concurrent lock resolved to existing snapshot', {
      documentId,
      snapshotId: winner.id,
    });
    return winner;
  }

  /** Current snapshot without locking, or null if the document was never locked. */
  async current(companyId: string, documentId: string): Promise<DocumentSnapshot | null> {
    const lifecycle = await this.db.getLifecycle(documentId);
    if (!lifecycle || lifecycle.companyId !== companyId || !lifecycle.currentSnapshotId) {
      return null;
    }
    return this.db.getSnapshot(lifecycle.currentSnapshotId);
  }

  /**
   * Fetch the live document and make sure the core tracks a lifecycle for it.
   */
  async loadDocument(
    companyId: string,
    documentId: string,
  ): Promise<{ document: BillingDocument; lifecycle: DocumentLifecycle }> {
    const document = await this.repository.getDocument(companyId, documentId);
    if (!document || document.companyId !== companyId) {
      throw new DocumentNotFoundError(documentId);
    }

    const lifecycle = await this.db.ensureLifecycle({
      documentId,
      companyId,
      kind: document.kind,
      status: 'DRAFT',
      currentSnapshotId: null,
      amountPaid: '0.00',
      dueDate: null,
      sentAt: null,
      updatedAt: this.now().toISOString(),
    });

    if (lifecycle.companyId !== companyId) {
      throw new DocumentNotFoundError(documentId);
    }

    return { document, lifecycle };
  }
}
