export {
  DocumentKindSchema,
  type DocumentKind,
  type DecimalInput,
  type LineItemInput,
  type ClientDetails,
  type BillingDocument,
  type CompanyBranding,
  type DocumentRepository,
} from './document.js';

export type {
  SnapshotLineItem,
  BrandingSnapshot,
  DocumentSnapshot,
} from './snapshot.js';

export type { RenderedArtifact, DownloadCredential } from './artifact.js';

export {
  DocumentStatusSchema,
  type DocumentStatus,
  type TransitionName,
  type DocumentLifecycle,
  type AuditAction,
  type AuditEntry,
  type DocumentSentEvent,
} from './lifecycle.js';

export type {
  StatusUpdate,
  ReclaimQuery,
  GetAuditOptions,
  CredentialIssueResult,
  DatabaseAdapter,
} from './database.js';
