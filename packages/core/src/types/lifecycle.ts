import { z } from 'zod';
import type { DocumentKind } from './document.js';

export const DocumentStatusSchema = z.enum([
  'DRAFT',
  'SENT',
  'VIEWED',
  'PARTIALLY_PAID',
  'PAID',
  'OVERDUE',
]);

export type DocumentStatus = z.infer<typeof DocumentStatusSchema>;

export type TransitionName =
  | 'lock_for_send'
  | 'client_view'
  | 'record_payment'
  | 'mark_overdue';

export interface DocumentLifecycle {
  documentId: string;
  companyId: string;
  kind: DocumentKind;
  status: DocumentStatus;
  currentSnapshotId: string | null;
  amountPaid: string;
  dueDate: string | null;
  sentAt: string | null;
  updatedAt: string;
}

export type AuditAction =
  | TransitionName
  | 'snapshot_locked'
  | 'pdf_link_issued'
  | 'pdf_downloaded'
  | 'artifact_reclaimed';

/** Append-only. Never updated or deleted. */
export interface AuditEntry {
  id: string;
  actor: string;
  action: AuditAction;
  companyId: string;
  documentId: string;
  details: Record<string, unknown>;
  createdAt: string;
}

export interface DocumentSentEvent {
  companyId: string;
  documentId: string;
  snapshotId: string;
  recipient: string | null;
}
