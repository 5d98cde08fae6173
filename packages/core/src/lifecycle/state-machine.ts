import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter, StatusUpdate } from '../types/database.js';
import type { DecimalInput } from '../types/document.js';
import type {
  AuditEntry,
  DocumentLifecycle,
  DocumentSentEvent,
  DocumentStatus,
  TransitionName,
} from '../types/lifecycle.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import type { SnapshotBuilder } from '../snapshot/builder.js';
import { Money, formatAmount, parseDecimal } from '../snapshot/money.js';
import {
  DocumentNotFoundError,
  IntegrityError,
  InvalidTransitionError,
  SnapshotNotFoundError,
  ValidationError,
} from '../errors/index.js';

/** Statuses each transition may start from. Anything else is rejected. */
export const TRANSITIONS: Readonly<Record<TransitionName, readonly DocumentStatus[]>> = {
  lock_for_send: ['DRAFT'],
  client_view: ['SENT', 'VIEWED', 'PARTIALLY_PAID', 'OVERDUE'],
  record_payment: ['SENT', 'VIEWED', 'PARTIALLY_PAID'],
  mark_overdue: ['SENT', 'VIEWED', 'PARTIALLY_PAID'],
};

export const OPEN_STATUSES: readonly DocumentStatus[] = TRANSITIONS.mark_overdue;

export function canApply(transition: TransitionName, status: DocumentStatus): boolean {
  return TRANSITIONS[transition].includes(status);
}

export interface DocumentNotifier {
  onDocumentSent(event: DocumentSentEvent): Promise<void> | void;
}

export interface StateMachineOptions {
  notifier?: DocumentNotifier;
  logger?: Logger;
  now?: () => Date;
}

export interface OverdueCheckResult {
  checked: number;
  markedOverdue: string[];
  failed: number;
}

/** A document is past due from the day after its due date (UTC). */
export function isPastDue(dueDate: string | null, now: Date): boolean {
  if (!dueDate) return false;
  return dueDate < now.toISOString().slice(0, 10);
}

/**
 * Document status lifecycle. Every change is a conditional update on the
 * status it was computed from, with one audit entry written alongside.
 */
export class DocumentStateMachine {
  private readonly db: DatabaseAdapter;
  private readonly builder: SnapshotBuilder;
  private readonly notifier: DocumentNotifier | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(db: DatabaseAdapter, builder: SnapshotBuilder, options?: StateMachineOptions) {
    this.db = db;
    this.builder = builder;
    this.notifier = options?.notifier;
    this.logger = options?.logger ?? noopLogger;
    this.now = options?.now ?? (() => new Date());
  }

  async getLifecycle(companyId: string, documentId: string): Promise<DocumentLifecycle> {
    const lifecycle = await this.db.getLifecycle(documentId);
    if (!lifecycle || lifecycle.companyId !== companyId) {
      throw new DocumentNotFoundError(documentId);
    }
    return lifecycle;
  }

  /**
   * Freeze the document and move it out of DRAFT. Live edits made after
   * this point never reach its PDFs.
   */
  async lockForSend(
    actor: string,
    companyId: string,
    documentId: string,
    recipient?: string | null,
  ): Promise<DocumentLifecycle> {
    const { lifecycle: before } = await this.builder.loadDocument(companyId, documentId);
    this.assertAllowed('lock_for_send', before.status);

    const snapshot = await this.builder.lock(actor, companyId, documentId);
    const lifecycle = await this.getLifecycle(companyId, documentId);
    const at = this.now().toISOString();

    const updated = await this.apply(actor, 'lock_for_send', lifecycle, {
      status: 'SENT',
      currentSnapshotId: snapshot.id,
      dueDate: snapshot.dueDate,
      sentAt: at,
      updatedAt: at,
    }, { snapshotId: snapshot.id, version: snapshot.version, recipient: recipient ?? null });

    await this.notifySent({ companyId, documentId, snapshotId: snapshot.id, recipient: recipient ?? null });
    return updated;
  }

  /** First view moves SENT to VIEWED; later views only add to the audit trail. */
  async clientView(actor: string, companyId: string, documentId: string): Promise<DocumentLifecycle> {
    const lifecycle = await this.getLifecycle(companyId, documentId);
    this.assertAllowed('client_view', lifecycle.status);

    return this.apply(actor, 'client_view', lifecycle, {
      status: lifecycle.status === 'SENT' ? 'VIEWED' : lifecycle.status,
      updatedAt: this.now().toISOString(),
    }, {});
  }

  /**
   * Add a payment to the cumulative amount paid. The document becomes PAID
   * once the cumulative amount reaches the snapshot total.
   */
  async recordPayment(
    actor: string,
    companyId: string,
    documentId: string,
    amount: DecimalInput,
  ): Promise<DocumentLifecycle> {
    const parsed = parseDecimal(amount);
    if (!parsed || !parsed.greaterThan(0) || parsed.decimalPlaces() > 2) {
      throw new ValidationError('Invalid payment amount', [
        'amount: must be a positive amount with at most 2 decimal places',
      ]);
    }

    const lifecycle = await this.getLifecycle(companyId, documentId);
    this.assertAllowed('record_payment', lifecycle.status);

    const snapshotId = lifecycle.currentSnapshotId;
    const snapshot = snapshotId ? await this.db.getSnapshot(snapshotId) : null;
    if (!snapshotId || !snapshot) {
      throw new SnapshotNotFoundError(snapshotId ?? documentId);
    }

    const paid = new Money(lifecycle.amountPaid).plus(parsed);
    const status: DocumentStatus = paid.greaterThanOrEqualTo(snapshot.total) ? 'PAID' : 'PARTIALLY_PAID';

    return this.apply(actor, 'record_payment', lifecycle, {
      status,
      amountPaid: formatAmount(paid),
      updatedAt: this.now().toISOString(),
    }, { amount: formatAmount(parsed), amountPaid: formatAmount(paid), total: snapshot.total });
  }

  async markOverdue(
    actor: string,
    companyId: string,
    documentId: string,
    now: Date = this.now(),
  ): Promise<DocumentLifecycle> {
    const lifecycle = await this.getLifecycle(companyId, documentId);
    this.assertAllowed('mark_overdue', lifecycle.status);
    if (!isPastDue(lifecycle.dueDate, now)) {
      throw new InvalidTransitionError('mark_overdue', lifecycle.status, 'document is not past due');
    }

    return this.apply(actor, 'mark_overdue', lifecycle, {
      status: 'OVERDUE',
      updatedAt: now.toISOString(),
    }, { dueDate: lifecycle.dueDate });
  }

  /** Mark every open document whose due date has passed. One failure does not stop the rest. */
  async runOverdueCheck(actor: string, now: Date = this.now()): Promise<OverdueCheckResult> {
    const open = await this.db.getLifecyclesByStatus([...OPEN_STATUSES]);
    const due = open.filter((lifecycle) => isPastDue(lifecycle.dueDate, now));

    const markedOverdue: string[] = [];
    let failed = 0;
    for (const lifecycle of due) {
      try {
        await this.markOverdue(actor, lifecycle.companyId, lifecycle.documentId, now);
        markedOverdue.push(lifecycle.documentId);
      } catch (error) {
        failed++;
        this.logger.warn('Overdue transition failed', {
          documentId: lifecycle.documentId,
          error: errorMessage(error),
        });
      }
    }

    this.logger.info('Overdue check completed', {
      checked: open.length,
      markedOverdue: markedOverdue.length,
      failed,
    });
    return { checked: open.length, markedOverdue, failed };
  }

  private assertAllowed(transition: TransitionName, status: DocumentStatus): void {
    if (!canApply(transition, status)) {
      throw new InvalidTransitionError(transition, status);
    }
  }

  private async apply(
    actor: string,
    transition: TransitionName,
    lifecycle: DocumentLifecycle,
    update: StatusUpdate,
    details: Record<string, unknown>,
  ): Promise<DocumentLifecycle> {
    const audit: AuditEntry = {
      id: randomUUID(),
      actor,
      action: transition,
      companyId: lifecycle.companyId,
      documentId: lifecycle.documentId,
      details: { from: lifecycle.status, to: update.status, ...details },
      createdAt: update.updatedAt,
    };

    const applied = await this.db.transitionLifecycle(lifecycle.documentId, lifecycle.status, update, audit);
    if (!applied) {
      throw new IntegrityError(
        `Document ${lifecycle.documentId} changed status while applying ${transition}`,
      );
    }

    this.logger.info('Document transitioned', {
      documentId: lifecycle.documentId,
      transition,
      from: lifecycle.status,
      to: update.status,
    });
    return { ...lifecycle, ...update };
  }

  private async notifySent(event: DocumentSentEvent): Promise<void> {
    if (!this.notifier) return;
    try {
      await this.notifier.onDocumentSent(event);
    } catch (error) {
      this.logger.error('document.sent notification failed', {
        documentId: event.documentId,
        error: errorMessage(error),
      });
    }
  }
}
