import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../types/database.js';
import type { DownloadCredential, RenderedArtifact } from '../types/artifact.js';
import type { AuditEntry } from '../types/lifecycle.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';
import { generateDownloadToken, hashDownloadToken, isWellFormedToken } from '../utils/crypto.js';
import type { ArtifactStore } from '../artifacts/store.js';
import {
  ArtifactNotFoundError,
  ArtifactUnavailableError,
  CredentialConsumedError,
  CredentialExpiredError,
  CredentialNotFoundError,
  IntegrityError,
} from '../errors/index.js';

export const DEFAULT_TOKEN_TTL_SECONDS = 300;
export const DEFAULT_CONSUMED_GRACE_SECONDS = 60;

const MAX_TOKEN_ATTEMPTS = 3;

export interface CredentialManagerOptions {
  tokenTtlSeconds?: number;
  /** How long a consumed artifact lingers before it is reclaimed */
  consumedGraceSeconds?: number;
  /**
   * Called after a successful redemption. Must not block; the periodic sweep
   * reclaims anything a scheduled reclaim misses.
   */
  scheduleReclaim?: (artifactId: string, delayMs: number) => void;
  logger?: Logger;
  now?: () => Date;
}

export interface IssuedCredential {
  credential: DownloadCredential;
  /** Plain token. Returned once and never stored. */
  token: string;
}

export interface Redemption {
  credential: DownloadCredential;
  artifact: RenderedArtifact;
  bytes: Buffer;
}

export class CredentialManager {
  private readonly db: DatabaseAdapter;
  private readonly store: ArtifactStore;
  private readonly ttlMs: number;
  private readonly graceMs: number;
  private readonly scheduleReclaim: (artifactId: string, delayMs: number) => void;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(db: DatabaseAdapter, store: ArtifactStore, options?: CredentialManagerOptions) {
    this.db = db;
    this.store = store;
    this.ttlMs = (options?.tokenTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS) * 1000;
    this.graceMs = (options?.consumedGraceSeconds ?? DEFAULT_CONSUMED_GRACE_SECONDS) * 1000;
    this.scheduleReclaim = options?.scheduleReclaim ?? (() => {});
    this.logger = options?.logger ?? noopLogger;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Issue a single-use credential for the artifact. The expiry is capped at
   * the artifact's stored expiry, read in the same transaction as the insert.
   * Throws ArtifactUnavailableError if the artifact is no longer live.
   */
  async issue(actor: string, artifact: RenderedArtifact): Promise<IssuedCredential> {
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.ttlMs).toISOString();

    for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
      const token = generateDownloadToken();
      const result = await this.db.issueCredential({
        tokenHash: hashDownloadToken(token),
        artifactId: artifact.id,
        issuedAt: now.toISOString(),
        expiresAt,
        consumedAt: null,
      });

      if (result.status === 'artifact_unavailable') {
        throw new ArtifactUnavailableError(artifact.id);
      }

      if (result.status === 'issued') {
        const { credential } = result;
        await this.db.appendAudit(
          this.audit(actor, 'pdf_link_issued', artifact, now, {
            artifactId: artifact.id,
            expiresAt: credential.expiresAt,
          }),
        );
        this.logger.info('Download link issued', {
          artifactId: artifact.id,
          expiresAt: credential.expiresAt,
        });
        return { credential, token };
      }

      this.logger.warn('Token hash collision, regenerating', { attempt });
    }

    throw new IntegrityError('Could not allocate a unique download token');
  }

  /**
   * Redeem a token for the artifact's bytes. Exactly one concurrent caller
   * succeeds; the rest see the credential as consumed.
   */
  async redeem(actor: string, token: string): Promise<Redemption> {
    if (!isWellFormedToken(token)) {
      throw new CredentialNotFoundError();
    }

    const tokenHash = hashDownloadToken(token);
    const now = this.now();
    const nowIso = now.toISOString();

    if (!(await this.db.consumeCredential(tokenHash, nowIso))) {
      throw await this.classifyFailure(tokenHash, now);
    }

    const credential = await this.db.getCredential(tokenHash);
    const artifact = credential ? await this.db.getArtifact(credential.artifactId) : null;
    if (!credential || !artifact) {
      throw new CredentialNotFoundError();
    }
    if (artifact.deletedAt) {
      throw new ArtifactNotFoundError(artifact.id);
    }

    const bytes = await this.store.read(artifact);
    await this.db.markArtifactConsumed(artifact.id, nowIso);
    await this.db.appendAudit(
      this.audit(actor, 'pdf_downloaded', artifact, now, {
        artifactId: artifact.id,
        byteSize: bytes.length,
      }),
    );

    this.scheduleReclaim(artifact.id, this.graceMs);
    this.logger.info('Download link redeemed', { artifactId: artifact.id });

    return { credential, artifact: { ...artifact, consumedAt: artifact.consumedAt ?? nowIso }, bytes };
  }

  /** Expiry wins over consumption so a stale link always reads as expired. */
  private async classifyFailure(tokenHash: string, now: Date): Promise<Error> {
    const credential = await this.db.getCredential(tokenHash);
    if (!credential) return new CredentialNotFoundError();
    if (now.getTime() > Date.parse(credential.expiresAt)) return new CredentialExpiredError();
    return new CredentialConsumedError();
  }

  private audit(
    actor: string,
    action: 'pdf_link_issued' | 'pdf_downloaded',
    artifact: RenderedArtifact,
    at: Date,
    details: Record<string, unknown>,
  ): AuditEntry {
    return {
      id: randomUUID(),
      actor,
      action,
      companyId: artifact.companyId,
      documentId: artifact.documentId,
      details,
      createdAt: at.toISOString(),
    };
  }
}
