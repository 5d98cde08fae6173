import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import type { ClientDetails, DocumentKind } from '../types/document.js';
import type { AuditAction, DocumentStatus } from '../types/lifecycle.js';
import type { BrandingSnapshot, SnapshotLineItem } from '../types/snapshot.js';

// ============================================
// DOCUMENT LIFECYCLES
// ============================================
export const documentLifecycles = sqliteTable(
  'document_lifecycles',
  {
    documentId: text('document_id').primaryKey(),
    companyId: text('company_id').notNull(),
    kind: text('kind').notNull().$type<DocumentKind>(),
    status: text('status').notNull().$type<DocumentStatus>().default('DRAFT'),
    currentSnapshotId: text('current_snapshot_id'),
    amountPaid: text('amount_paid').notNull().default('0.00'),
    dueDate: text('due_date'),
    sentAt: text('sent_at'),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    index('document_lifecycles_company').on(table.companyId),
    index('document_lifecycles_status').on(table.status),
  ],
);

// ============================================
// DOCUMENT SNAPSHOTS
// ============================================
export const documentSnapshots = sqliteTable(
  'document_snapshots',
  {
    id: text('id').primaryKey(),
    documentId: text('document_id').notNull(),
    companyId: text('company_id').notNull(),
    version: integer('version').notNull(),
    kind: text('kind').notNull().$type<DocumentKind>(),
    number: text('number').notNull(),
    currency: text('currency').notNull(),
    taxRate: text('tax_rate').notNull(),
    issueDate: text('issue_date').notNull(),
    dueDate: text('due_date'),
    client: text('client', { mode: 'json' }).notNull().$type<ClientDetails>(),
    notes: text('notes'),
    lineItems: text('line_items', { mode: 'json' }).notNull().$type<SnapshotLineItem[]>(),
    branding: text('branding', { mode: 'json' }).notNull().$type<BrandingSnapshot>(),
    subtotal: text('subtotal').notNull(),
    taxTotal: text('tax_total').notNull(),
    total: text('total').notNull(),
    contentHash: text('content_hash').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    uniqueIndex('document_snapshots_version').on(table.documentId, table.version),
  ],
);

// ============================================
// RENDERED ARTIFACTS
// ============================================
export const renderedArtifacts = sqliteTable(
  'rendered_artifacts',
  {
    id: text('id').primaryKey(),
    companyId: text('company_id').notNull(),
    documentId: text('document_id').notNull(),
    snapshotId: text('snapshot_id').notNull(),
    templateId: text('template_id').notNull(),
    brandingFingerprint: text('branding_fingerprint').notNull(),
    storagePath: text('storage_path').notNull(),
    byteSize: integer('byte_size').notNull(),
    checksum: text('checksum').notNull(),
    createdAt: text('created_at').notNull(),
    expiresAt: text('expires_at').notNull(),
    consumedAt: text('consumed_at'),
    deletedAt: text('deleted_at'),
  },
  (table) => [
    index('rendered_artifacts_document_snapshot').on(table.documentId, table.snapshotId),
    index('rendered_artifacts_expires').on(table.expiresAt),
  ],
);

// ============================================
// DOWNLOAD CREDENTIALS
// ============================================
export const downloadCredentials = sqliteTable(
  'download_credentials',
  {
    tokenHash: text('token_hash').primaryKey(),
    artifactId: text('artifact_id').notNull(),
    issuedAt: text('issued_at').notNull(),
    expiresAt: text('expires_at').notNull(),
    consumedAt: text('consumed_at'),
  },
  (table) => [index('download_credentials_artifact').on(table.artifactId)],
);

// ============================================
// AUDIT ENTRIES
// ============================================
export const auditEntries = sqliteTable(
  'audit_entries',
  {
    id: text('id').primaryKey(),
    actor: text('actor').notNull(),
    action: text('action').notNull().$type<AuditAction>(),
    companyId: text('company_id').notNull(),
    documentId: text('document_id').notNull(),
    details: text('details', { mode: 'json' }).notNull().$type<Record<string, unknown>>(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [index('audit_entries_document').on(table.documentId, table.createdAt)],
);
