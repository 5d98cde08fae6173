import type { DocumentSnapshot } from './snapshot.js';
import type { RenderedArtifact, DownloadCredential } from './artifact.js';
import type { DocumentLifecycle, DocumentStatus, AuditEntry } from './lifecycle.js';

export interface StatusUpdate {
  status: DocumentStatus;
  amountPaid?: string;
  dueDate?: string | null;
  sentAt?: string | null;
  currentSnapshotId?: string | null;
  updatedAt: string;
}

export interface ReclaimQuery {
  now: string;
  /** Consumed artifacts become reclaimable once consumed before this instant */
  consumedBefore: string;
}

/** Outcome of an atomic credential insert against the stored artifact. */
export type CredentialIssueResult =
  | { status: 'issued'; credential: DownloadCredential }
  | { status: 'duplicate_token' }
  | { status: 'artifact_unavailable' };

export interface GetAuditOptions {
  since?: string;
  limit?: number;
}

/**
 * Storage adapter for everything the core persists. Atomic guarantees
 * (insert-if-absent, conditional updates) are the adapter's job, not the
 * callers'.
 */
export interface DatabaseAdapter {
  // Lifecycles
  ensureLifecycle(lifecycle: DocumentLifecycle): Promise<DocumentLifecycle>;
  getLifecycle(documentId: string): Promise<DocumentLifecycle | null>;
  getLifecyclesByStatus(statuses: DocumentStatus[]): Promise<DocumentLifecycle[]>;
  /**
   * Applies the update only if the document is still in `expectedStatus`,
   * appending the audit entry in the same transaction.
   * Returns false when another writer changed the status first.
   */
  transitionLifecycle(
    documentId: string,
    expectedStatus: DocumentStatus,
    update: StatusUpdate,
    audit: AuditEntry,
  ): Promise<boolean>;

  // Snapshots
  /**
   * Inserts the snapshot only if no snapshot with the same
   * (documentId, version) exists, and points the lifecycle at it.
   * Returns false when the slot was already taken. Throws IntegrityError,
   * writing nothing, when the document has left DRAFT or its current
   * snapshot is no longer `expectedSnapshotId`.
   */
  insertSnapshotIfAbsent(
    snapshot: DocumentSnapshot,
    audit: AuditEntry,
    expectedSnapshotId: string | null,
  ): Promise<boolean>;
  getSnapshot(snapshotId: string): Promise<DocumentSnapshot | null>;
  getSnapshotByVersion(documentId: string, version: number): Promise<DocumentSnapshot | null>;
  getSnapshots(documentId: string): Promise<DocumentSnapshot[]>;

  // Artifacts
  insertArtifact(artifact: RenderedArtifact): Promise<void>;
  getArtifact(artifactId: string): Promise<RenderedArtifact | null>;
  getLiveArtifacts(documentId: string, snapshotId: string, now: string): Promise<RenderedArtifact[]>;
  /**
   * Returns the live artifact for the same snapshot, template and branding
   * fingerprint if one exists. Otherwise retires the snapshot's other live
   * artifacts (and their credentials) as of `artifact.createdAt` and inserts
   * this one. One transaction.
   */
  insertArtifactSuperseding(artifact: RenderedArtifact): Promise<RenderedArtifact>;
  markArtifactConsumed(artifactId: string, at: string): Promise<void>;
  markArtifactDeleted(artifactId: string, at: string): Promise<boolean>;
  getReclaimableArtifacts(query: ReclaimQuery): Promise<RenderedArtifact[]>;

  // Download credentials
  /** Returns false if the token hash is already taken. */
  insertCredential(credential: DownloadCredential): Promise<boolean>;
  /**
   * Inserts the credential only while its artifact is live at `issuedAt`,
   * with the expiry capped at the stored artifact's expiry.
   */
  issueCredential(credential: DownloadCredential): Promise<CredentialIssueResult>;
  getCredential(tokenHash: string): Promise<DownloadCredential | null>;
  /**
   * Marks the credential consumed only if it is unconsumed and
   * `now <= expiresAt`. Returns true for exactly one caller.
   */
  consumeCredential(tokenHash: string, now: string): Promise<boolean>;
  deleteCredentialsForArtifact(artifactId: string): Promise<number>;
  purgeCredentials(query: ReclaimQuery): Promise<number>;

  // Audit trail
  appendAudit(entry: AuditEntry): Promise<void>;
  getAuditEntries(documentId: string, options?: GetAuditOptions): Promise<AuditEntry[]>;

  // Schema management
  migrate(): Promise<void>;
}
