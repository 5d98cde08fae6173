import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq, and, or, sql, asc, desc, gte, lte, gt, isNull, isNotNull, inArray } from 'drizzle-orm';
import type {
  DatabaseAdapter,
  StatusUpdate,
  ReclaimQuery,
  GetAuditOptions,
  CredentialIssueResult,
} from '../types/database.js';
import type { DocumentSnapshot } from '../types/snapshot.js';
import type { RenderedArtifact, DownloadCredential } from '../types/artifact.js';
import type { DocumentLifecycle, DocumentStatus, AuditEntry } from '../types/lifecycle.js';
import { IntegrityError } from '../errors/index.js';
import * as schema from './schema.js';

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: BetterSQLite3Database<typeof schema>;
  private readonly sqlite: Database.Database;

  constructor(pathOrDb: string | Database.Database) {
    const sqlite = typeof pathOrDb === 'string' ? new Database(pathOrDb) : pathOrDb;
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    this.sqlite = sqlite;
    this.db = drizzle(sqlite, { schema });
  }

  async migrate(): Promise<void> {
    const statements = [
      `CREATE TABLE IF NOT EXISTS document_lifecycles (
        document_id TEXT PRIMARY KEY,
        company_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'DRAFT',
        current_snapshot_id TEXT,
        amount_paid TEXT NOT NULL DEFAULT '0.00',
        due_date TEXT,
        sent_at TEXT,
        updated_at TEXT NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS document_lifecycles_company ON document_lifecycles (company_id)`,
      `CREATE INDEX IF NOT EXISTS document_lifecycles_status ON document_lifecycles (status)`,
      `CREATE TABLE IF NOT EXISTS document_snapshots (
        id TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        company_id TEXT NOT NULL,
        version INTEGER NOT NULL,
        kind TEXT NOT NULL,
        number TEXT NOT NULL,
        currency TEXT NOT NULL,
        tax_rate TEXT NOT NULL,
        issue_date TEXT NOT NULL,
        due_date TEXT,
        client TEXT NOT NULL,
        notes TEXT,
        line_items TEXT NOT NULL,
        branding TEXT NOT NULL,
        subtotal TEXT NOT NULL,
        tax_total TEXT NOT NULL,
        total TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        created_at TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS document_snapshots_version ON document_snapshots (document_id, version)`,
      `CREATE TABLE IF NOT EXISTS rendered_artifacts (
        id TEXT PRIMARY KEY,
        company_id TEXT NOT NULL,
        document_id TEXT NOT NULL,
        snapshot_id TEXT NOT NULL,
        template_id TEXT NOT NULL,
        branding_fingerprint TEXT NOT NULL,
        storage_path TEXT NOT NULL,
        byte_size INTEGER NOT NULL,
        checksum TEXT NOT NULL,
        created_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        consumed_at TEXT,
        deleted_at TEXT
      )`,
      `CREATE INDEX IF NOT EXISTS rendered_artifacts_document_snapshot ON rendered_artifacts (document_id, snapshot_id)`,
      `CREATE INDEX IF NOT EXISTS rendered_artifacts_expires ON rendered_artifacts (expires_at)`,
      `CREATE TABLE IF NOT EXISTS download_credentials (
        token_hash TEXT PRIMARY KEY,
        artifact_id TEXT NOT NULL,
        issued_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        consumed_at TEXT
      )`,
      `CREATE INDEX IF NOT EXISTS download_credentials_artifact ON download_credentials (artifact_id)`,
      `CREATE TABLE IF NOT EXISTS audit_entries (
        id TEXT PRIMARY KEY,
        actor TEXT NOT NULL,
        action TEXT NOT NULL,
        company_id TEXT NOT NULL,
        document_id TEXT NOT NULL,
        details TEXT NOT NULL,
        created_at TEXT NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS audit_entries_document ON audit_entries (document_id, created_at)`,
    ];

    for (const stmt of statements) {
      this.db.run(sql.raw(stmt));
    }
  }

  close(): void {
    this.sqlite.close();
  }

  // ============================================
  // Lifecycles
  // ============================================

  async ensureLifecycle(lifecycle: DocumentLifecycle): Promise<DocumentLifecycle> {
    this.db
      .insert(schema.documentLifecycles)
      .values(lifecycle)
      .onConflictDoNothing()
      .run();

    const row = this.db
      .select()
      .from(schema.documentLifecycles)
      .where(eq(schema.documentLifecycles.documentId, lifecycle.documentId))
      .get();

    return row ?? lifecycle;
  }

  async getLifecycle(documentId: string): Promise<DocumentLifecycle | null> {
    const row = this.db
      .select()
      .from(schema.documentLifecycles)
      .where(eq(schema.documentLifecycles.documentId, documentId))
      .get();

    return row ?? null;
  }

  async getLifecyclesByStatus(statuses: DocumentStatus[]): Promise<DocumentLifecycle[]> {
    if (statuses.length === 0) return [];
    return this.db
      .select()
      .from(schema.documentLifecycles)
      .where(inArray(schema.documentLifecycles.status, statuses))
      .orderBy(asc(schema.documentLifecycles.documentId))
      .all();
  }

  async transitionLifecycle(
    documentId: string,
    expectedStatus: DocumentStatus,
    update: StatusUpdate,
    audit: AuditEntry,
  ): Promise<boolean> {
    return this.sqlite.transaction(() => {
      const result = this.db
        .update(schema.documentLifecycles)
        .set(update)
        .where(
          and(
            eq(schema.documentLifecycles.documentId, documentId),
            eq(schema.documentLifecycles.status, expectedStatus),
          ),
        )
        .run();

      if (result.changes !== 1) return false;

      this.db.insert(schema.auditEntries).values(audit).run();
      return true;
    })();
  }

  // ============================================
  // Snapshots
  // ============================================

  async insertSnapshotIfAbsent(
    snapshot: DocumentSnapshot,
    audit: AuditEntry,
    expectedSnapshotId: string | null,
  ): Promise<boolean> {
    return this.sqlite.transaction(() => {
      const result = this.db
        .insert(schema.documentSnapshots)
        .values(snapshot)
        .onConflictDoNothing({
          target: [schema.documentSnapshots.documentId, schema.documentSnapshots.version],
        })
        .run();

      if (result.changes !== 1) return false;

      const moved = this.db
        .update(schema.documentLifecycles)
        .set({ currentSnapshotId: snapshot.id, updatedAt: snapshot.createdAt })
        .where(
          and(
            eq(schema.documentLifecycles.documentId, snapshot.documentId),
            eq(schema.documentLifecycles.status, 'DRAFT'),
            expectedSnapshotId === null
              ? isNull(schema.documentLifecycles.currentSnapshotId)
              : eq(schema.documentLifecycles.currentSnapshotId, expectedSnapshotId),
          ),
        )
        .run();

      // Throwing rolls the snapshot insert back
      if (moved.changes !== 1) {
        throw new IntegrityError(
          `Document ${snapshot.documentId} changed while version ${snapshot.version} was being locked`,
        );
      }

      this.db.insert(schema.auditEntries).values(audit).run();
      return true;
    })();
  }

  async getSnapshot(snapshotId: string): Promise<DocumentSnapshot | null> {
    const row = this.db
      .select()
      .from(schema.documentSnapshots)
      .where(eq(schema.documentSnapshots.id, snapshotId))
      .get();

    return row ?? null;
  }

  async getSnapshotByVersion(documentId: string, version: number): Promise<DocumentSnapshot | null> {
    const row = this.db
      .select()
      .from(schema.documentSnapshots)
      .where(
        and(
          eq(schema.documentSnapshots.documentId, documentId),
          eq(schema.documentSnapshots.version, version),
        ),
      )
      .get();

    return row ?? null;
  }

  async getSnapshots(documentId: string): Promise<DocumentSnapshot[]> {
    return this.db
      .select()
      .from(schema.documentSnapshots)
      .where(eq(schema.documentSnapshots.documentId, documentId))
      .orderBy(asc(schema.documentSnapshots.version))
      .all();
  }

  // ============================================
  // Artifacts
  // ============================================

  async insertArtifact(artifact: RenderedArtifact): Promise<void> {
    this.db.insert(schema.renderedArtifacts).values(artifact).run();
  }

  async getArtifact(artifactId: string): Promise<RenderedArtifact | null> {
    const row = this.db
      .select()
      .from(schema.renderedArtifacts)
      .where(eq(schema.renderedArtifacts.id, artifactId))
      .get();

    return row ?? null;
  }

  async getLiveArtifacts(
    documentId: string,
    snapshotId: string,
    now: string,
  ): Promise<RenderedArtifact[]> {
    return this.db
      .select()
      .from(schema.renderedArtifacts)
      .where(
        and(
          eq(schema.renderedArtifacts.documentId, documentId),
          eq(schema.renderedArtifacts.snapshotId, snapshotId),
          isNull(schema.renderedArtifacts.consumedAt),
          isNull(schema.renderedArtifacts.deletedAt),
          gt(schema.renderedArtifacts.expiresAt, now),
        ),
      )
      .orderBy(desc(schema.renderedArtifacts.createdAt))
      .all();
  }

  async insertArtifactSuperseding(artifact: RenderedArtifact): Promise<RenderedArtifact> {
    return this.sqlite.transaction((): RenderedArtifact => {
      const live = this.db
        .select()
        .from(schema.renderedArtifacts)
        .where(
          and(
            eq(schema.renderedArtifacts.documentId, artifact.documentId),
            eq(schema.renderedArtifacts.snapshotId, artifact.snapshotId),
            isNull(schema.renderedArtifacts.consumedAt),
            isNull(schema.renderedArtifacts.deletedAt),
            gt(schema.renderedArtifacts.expiresAt, artifact.createdAt),
          ),
        )
        .all();

      const match = live.find(
        (a) =>
          a.templateId === artifact.templateId &&
          a.brandingFingerprint === artifact.brandingFingerprint,
      );
      if (match) return match;

      for (const other of live) {
        this.retire(other.id, artifact.createdAt);
      }
      this.db.insert(schema.renderedArtifacts).values(artifact).run();
      return artifact;
    })();
  }

  async markArtifactConsumed(artifactId: string, at: string): Promise<void> {
    this.db
      .update(schema.renderedArtifacts)
      .set({ consumedAt: at })
      .where(
        and(
          eq(schema.renderedArtifacts.id, artifactId),
          isNull(schema.renderedArtifacts.consumedAt),
        ),
      )
      .run();
  }

  async markArtifactDeleted(artifactId: string, at: string): Promise<boolean> {
    const result = this.db
      .update(schema.renderedArtifacts)
      .set({ deletedAt: at })
      .where(
        and(
          eq(schema.renderedArtifacts.id, artifactId),
          isNull(schema.renderedArtifacts.deletedAt),
        ),
      )
      .run();

    return result.changes === 1;
  }

  async getReclaimableArtifacts(query: ReclaimQuery): Promise<RenderedArtifact[]> {
    return this.db
      .select()
      .from(schema.renderedArtifacts)
      .where(
        and(
          isNull(schema.renderedArtifacts.deletedAt),
          or(
            lte(schema.renderedArtifacts.expiresAt, query.now),
            and(
              isNotNull(schema.renderedArtifacts.consumedAt),
              lte(schema.renderedArtifacts.consumedAt, query.consumedBefore),
            ),
          ),
        ),
      )
      .orderBy(asc(schema.renderedArtifacts.expiresAt))
      .all();
  }

  // ============================================
  // Download Credentials
  // ============================================

  async insertCredential(credential: DownloadCredential): Promise<boolean> {
    const result = this.db
      .insert(schema.downloadCredentials)
      .values(credential)
      .onConflictDoNothing()
      .run();

    return result.changes === 1;
  }

  async issueCredential(credential: DownloadCredential): Promise<CredentialIssueResult> {
    return this.sqlite.transaction((): CredentialIssueResult => {
      const artifact = this.db
        .select()
        .from(schema.renderedArtifacts)
        .where(
          and(
            eq(schema.renderedArtifacts.id, credential.artifactId),
            isNull(schema.renderedArtifacts.consumedAt),
            isNull(schema.renderedArtifacts.deletedAt),
            gt(schema.renderedArtifacts.expiresAt, credential.issuedAt),
          ),
        )
        .get();

      if (!artifact) return { status: 'artifact_unavailable' };

      // ISO-8601 UTC strings order lexically
      const capped: DownloadCredential = {
        ...credential,
        expiresAt: credential.expiresAt < artifact.expiresAt ? credential.expiresAt : artifact.expiresAt,
      };

      const result = this.db
        .insert(schema.downloadCredentials)
        .values(capped)
        .onConflictDoNothing()
        .run();

      if (result.changes !== 1) return { status: 'duplicate_token' };
      return { status: 'issued', credential: capped };
    })();
  }

  async getCredential(tokenHash: string): Promise<DownloadCredential | null> {
    const row = this.db
      .select()
      .from(schema.downloadCredentials)
      .where(eq(schema.downloadCredentials.tokenHash, tokenHash))
      .get();

    return row ?? null;
  }

  async consumeCredential(tokenHash: string, now: string): Promise<boolean> {
    const result = this.db
      .update(schema.downloadCredentials)
      .set({ consumedAt: now })
      .where(
        and(
          eq(schema.downloadCredentials.tokenHash, tokenHash),
          isNull(schema.downloadCredentials.consumedAt),
          gte(schema.downloadCredentials.expiresAt, now),
        ),
      )
      .run();

    return result.changes === 1;
  }

  async deleteCredentialsForArtifact(artifactId: string): Promise<number> {
    const result = this.db
      .delete(schema.downloadCredentials)
      .where(eq(schema.downloadCredentials.artifactId, artifactId))
      .run();

    return result.changes;
  }

  async purgeCredentials(query: ReclaimQuery): Promise<number> {
    const deletedArtifacts = this.db
      .select({ id: schema.renderedArtifacts.id })
      .from(schema.renderedArtifacts)
      .where(isNotNull(schema.renderedArtifacts.deletedAt));

    const result = this.db
      .delete(schema.downloadCredentials)
      .where(
        or(
          lte(schema.downloadCredentials.expiresAt, query.now),
          and(
            isNotNull(schema.downloadCredentials.consumedAt),
            lte(schema.downloadCredentials.consumedAt, query.consumedBefore),
          ),
          inArray(schema.downloadCredentials.artifactId, deletedArtifacts),
        ),
      )
      .run();

    return result.changes;
  }

  // ============================================
  // Audit Trail
  // ============================================

  async appendAudit(entry: AuditEntry): Promise<void> {
    this.db.insert(schema.auditEntries).values(entry).run();
  }

  async getAuditEntries(documentId: string, options?: GetAuditOptions): Promise<AuditEntry[]> {
    const conditions = [eq(schema.auditEntries.documentId, documentId)];
    if (options?.since) {
      conditions.push(gte(schema.auditEntries.createdAt, options.since));
    }

    return this.db
      .select()
      .from(schema.auditEntries)
      .where(and(...conditions))
      .orderBy(asc(schema.auditEntries.createdAt), sql`rowid`)
      .limit(options?.limit ?? 500)
      .all();
  }

  /** Expire a live artifact and its credentials at `at`, never extending either. */
  private retire(artifactId: string, at: string): void {
    this.db
      .update(schema.renderedArtifacts)
      .set({ expiresAt: at })
      .where(and(eq(schema.renderedArtifacts.id, artifactId), gt(schema.renderedArtifacts.expiresAt, at)))
      .run();

    this.db
      .update(schema.downloadCredentials)
      .set({ expiresAt: at })
      .where(
        and(
          eq(schema.downloadCredentials.artifactId, artifactId),
          gt(schema.downloadCredentials.expiresAt, at),
        ),
      )
      .run();
  }
}
