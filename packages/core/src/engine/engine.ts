import type { DatabaseAdapter } from '../types/database.js';
import type { DocumentRepository } from '../types/document.js';
import type { BrandingSnapshot, DocumentSnapshot } from '../types/snapshot.js';
import type { AuditEntry, DocumentLifecycle } from '../types/lifecycle.js';
import type { RenderedArtifact } from '../types/artifact.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { SnapshotBuilder } from '../snapshot/builder.js';
import { brandingSnapshot, buildSnapshot } from '../snapshot/builder.js';
import type { Renderer } from '../render/renderer.js';
import { brandingFingerprint } from '../render/renderer.js';
import type { TemplateId } from '../render/templates.js';
import { resolveTemplate } from '../render/templates.js';
import type { ArtifactStore } from '../artifacts/store.js';
import type { CredentialManager } from '../credentials/manager.js';
import type { DocumentStateMachine } from '../lifecycle/state-machine.js';
import { ArtifactUnavailableError, IntegrityError, ValidationError } from '../errors/index.js';

export const DEFAULT_AUDIT_RETENTION_DAYS = 30;

/** Renders raced by a superseding render before a link could be issued */
const MAX_ISSUE_ATTEMPTS = 3;

export interface DocumentEngineComponents {
  db: DatabaseAdapter;
  repository: DocumentRepository;
  builder: SnapshotBuilder;
  renderer: Renderer;
  store: ArtifactStore;
  credentials: CredentialManager;
  lifecycle: DocumentStateMachine;
}

export interface DocumentEngineOptions {
  /** Base the download URL is built on, e.g. "https://billing.example.test" */
  publicBaseUrl?: string;
  defaultTemplate?: TemplateId;
  /** Default window for audit listings */
  auditRetentionDays?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface GenerateOptions {
  templateId?: string;
  /** Regenerate from this historical snapshot with its frozen branding */
  snapshotId?: string;
}

export interface GeneratedLink {
  downloadUrl: string;
  expiresAt: string;
  artifactId: string;
  snapshotId: string;
}

export interface DownloadResult {
  bytes: Buffer;
  filename: string;
  contentType: 'application/pdf';
}

export interface DocumentHistory {
  lifecycle: DocumentLifecycle;
  snapshots: Array<Pick<DocumentSnapshot, 'id' | 'version' | 'total' | 'contentHash' | 'createdAt'>>;
  audit: AuditEntry[];
}

/**
 * Orchestrates the PDF flow: lock a snapshot, reuse or render an artifact,
 * and hand out a single-use download link for it.
 */
export class DocumentEngine {
  private readonly components: DocumentEngineComponents;
  private readonly publicBaseUrl: string;
  private readonly defaultTemplate: TemplateId;
  private readonly auditRetentionMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(components: DocumentEngineComponents, options?: DocumentEngineOptions) {
    this.components = components;
    this.publicBaseUrl = (options?.publicBaseUrl ?? '').replace(/\/+$/, '');
    this.defaultTemplate = options?.defaultTemplate ?? 'classic';
    this.auditRetentionMs = (options?.auditRetentionDays ?? DEFAULT_AUDIT_RETENTION_DAYS) * 86_400_000;
    this.logger = options?.logger ?? noopLogger;
    this.now = options?.now ?? (() => new Date());
  }

  async generate(
    actor: string,
    companyId: string,
    documentId: string,
    options?: GenerateOptions,
  ): Promise<GeneratedLink> {
    const { builder, credentials } = this.components;
    const templateId = resolveTemplate(options?.templateId ?? this.defaultTemplate).id;

    const snapshot = await withRetry(
      () => builder.lock(actor, companyId, documentId, { snapshotId: options?.snapshotId }),
      {
        shouldRetry: (error) => error instanceof IntegrityError,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn('Retrying snapshot lock', { documentId, attempt, delayMs, error: errorMessage(error) }),
      },
    );

    const branding = options?.snapshotId
      ? snapshot.branding
      : await this.liveBranding(companyId, snapshot);

    for (let attempt = 1; ; attempt++) {
      const artifact = await this.reuseOrRender(companyId, documentId, snapshot, templateId, branding);
      try {
        const { token, credential } = await credentials.issue(actor, artifact);
        return {
          downloadUrl: `${this.publicBaseUrl}/download/${token}`,
          expiresAt: credential.expiresAt,
          artifactId: artifact.id,
          snapshotId: snapshot.id,
        };
      } catch (error) {
        if (!(error instanceof ArtifactUnavailableError) || attempt >= MAX_ISSUE_ATTEMPTS) throw error;
        this.logger.warn('Artifact superseded before its link was issued', {
          documentId,
          artifactId: artifact.id,
          attempt,
        });
      }
    }
  }

  async download(actor: string, token: string): Promise<DownloadResult> {
    const { db, credentials, lifecycle } = this.components;
    const { artifact, bytes } = await credentials.redeem(actor, token);

    const current = await db.getLifecycle(artifact.documentId);
    if (current?.status === 'SENT') {
      try {
        await lifecycle.clientView(actor, artifact.companyId, artifact.documentId);
      } catch (error) {
        this.logger.warn('Could not record client view', {
          documentId: artifact.documentId,
          error: errorMessage(error),
        });
      }
    }

    const snapshot = await db.getSnapshot(artifact.snapshotId);
    const filename = snapshot
      ? downloadFilename(snapshot.kind, snapshot.number)
      : downloadFilename('document', artifact.documentId);

    return { bytes, filename, contentType: 'application/pdf' };
  }

  /**
   * HTML preview. Drafts are previewed from live data without storing a
   * snapshot; locked documents from their current snapshot.
   */
  async preview(companyId: string, documentId: string, templateId?: string): Promise<string> {
    const { db, repository, builder, renderer } = this.components;
    const template = resolveTemplate(templateId ?? this.defaultTemplate).id;
    const { document, lifecycle } = await builder.loadDocument(companyId, documentId);

    const current = lifecycle.currentSnapshotId ? await db.getSnapshot(lifecycle.currentSnapshotId) : null;
    if (current && lifecycle.status !== 'DRAFT') {
      return renderer.preview(current, template, await this.liveBranding(companyId, current));
    }

    const branding = await repository.getCurrentCompanyBranding(companyId);
    if (!branding) {
      throw new ValidationError(`Company ${companyId} has no branding profile`, [
        'branding: company profile is not set up',
      ]);
    }
    const draft = buildSnapshot(document, branding, {
      id: 'preview',
      version: (current?.version ?? 0) + 1,
      createdAt: this.now().toISOString(),
    });
    return renderer.preview(draft, template, draft.branding);
  }

  /** Lifecycle, snapshot versions and the audit trail within the retention window. */
  async history(companyId: string, documentId: string, options?: { since?: string }): Promise<DocumentHistory> {
    const { db, lifecycle } = this.components;
    const current = await lifecycle.getLifecycle(companyId, documentId);
    const since = options?.since ?? new Date(this.now().getTime() - this.auditRetentionMs).toISOString();

    const snapshots = await db.getSnapshots(documentId);
    const audit = await db.getAuditEntries(documentId, { since });

    return {
      lifecycle: current,
      snapshots: snapshots.map(({ id, version, total, contentHash, createdAt }) => ({
        id,
        version,
        total,
        contentHash,
        createdAt,
      })),
      audit,
    };
  }

  private async reuseOrRender(
    companyId: string,
    documentId: string,
    snapshot: DocumentSnapshot,
    templateId: TemplateId,
    branding: BrandingSnapshot,
  ): Promise<RenderedArtifact> {
    const { renderer, store } = this.components;
    const fingerprint = brandingFingerprint(branding);

    const reusable = await store.findReusable({
      documentId,
      snapshotId: snapshot.id,
      templateId,
      brandingFingerprint: fingerprint,
    });
    if (reusable) {
      this.logger.debug('Reusing live artifact', { artifactId: reusable.id });
      return reusable;
    }

    const bytes = await renderer.render(snapshot, templateId, branding);
    return store.persist({
      companyId,
      documentId,
      snapshotId: snapshot.id,
      templateId,
      brandingFingerprint: fingerprint,
      bytes,
    });
  }

  private async liveBranding(companyId: string, snapshot: DocumentSnapshot): Promise<BrandingSnapshot> {
    const live = await this.components.repository.getCurrentCompanyBranding(companyId);
    return live ? brandingSnapshot(live) : snapshot.branding;
  }
}

/** `<kind>_<number>.pdf` with anything outside a safe set replaced. */
export function downloadFilename(kind: string, number: string): string {
  const safe = `${kind}_${number}`.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
  return `${safe || 'document'}.pdf`;
}
