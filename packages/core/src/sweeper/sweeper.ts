import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter, ReclaimQuery } from '../types/database.js';
import type { RenderedArtifact } from '../types/artifact.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import type { ArtifactStore } from '../artifacts/store.js';
import { DEFAULT_CONSUMED_GRACE_SECONDS } from '../credentials/manager.js';

export interface SweeperOptions {
  consumedGraceSeconds?: number;
  logger?: Logger;
}

export interface SweepOptions {
  /** Report what would be reclaimed without deleting anything */
  dryRun?: boolean;
}

export interface SweepResult {
  deleted: number;
  purgedCredentials: number;
  failed: number;
  dryRun: boolean;
  /** Ids of the artifacts considered in this pass */
  candidates: string[];
}

/**
 * Reclaims the bytes of expired and consumed artifacts and purges dead
 * credentials. Safe to run repeatedly: reclaimed artifacts are marked
 * deleted and never considered again. Snapshots are left alone.
 */
export class Sweeper {
  private readonly db: DatabaseAdapter;
  private readonly store: ArtifactStore;
  private readonly graceMs: number;
  private readonly logger: Logger;

  constructor(db: DatabaseAdapter, store: ArtifactStore, options?: SweeperOptions) {
    this.db = db;
    this.store = store;
    this.graceMs = (options?.consumedGraceSeconds ?? DEFAULT_CONSUMED_GRACE_SECONDS) * 1000;
    this.logger = options?.logger ?? noopLogger;
  }

  async sweep(actor: string, now: Date = new Date(), options?: SweepOptions): Promise<SweepResult> {
    const query = this.query(now);
    const candidates = await this.db.getReclaimableArtifacts(query);
    const ids = candidates.map((artifact) => artifact.id);

    if (options?.dryRun) {
      this.logger.info('Sweep dry run', { candidates: ids.length });
      return { deleted: 0, purgedCredentials: 0, failed: 0, dryRun: true, candidates: ids };
    }

    let deleted = 0;
    let failed = 0;
    for (const artifact of candidates) {
      try {
        if (await this.reclaimArtifact(actor, artifact, query.now)) deleted++;
      } catch (error) {
        failed++;
        this.logger.error('Failed to reclaim artifact', {
          artifactId: artifact.id,
          error: errorMessage(error),
        });
      }
    }

    const purgedCredentials = await this.db.purgeCredentials(query);

    this.logger.info('Sweep completed', { deleted, failed, purgedCredentials });
    return { deleted, purgedCredentials, failed, dryRun: false, candidates: ids };
  }

  /**
   * Reclaim one artifact if it is due. Returns false when it is unknown,
   * already deleted, or still live.
   */
  async reclaim(actor: string, artifactId: string, now: Date = new Date()): Promise<boolean> {
    const artifact = await this.db.getArtifact(artifactId);
    if (!artifact || artifact.deletedAt) return false;

    const query = this.query(now);
    const expired = artifact.expiresAt <= query.now;
    const graceElapsed = artifact.consumedAt !== null && artifact.consumedAt <= query.consumedBefore;
    if (!expired && !graceElapsed) return false;

    const reclaimed = await this.reclaimArtifact(actor, artifact, query.now);
    if (reclaimed) {
      await this.db.deleteCredentialsForArtifact(artifact.id);
    }
    return reclaimed;
  }

  private async reclaimArtifact(actor: string, artifact: RenderedArtifact, at: string): Promise<boolean> {
    await this.store.remove(artifact);
    if (!(await this.db.markArtifactDeleted(artifact.id, at))) {
      return false;
    }

    await this.db.appendAudit({
      id: randomUUID(),
      actor,
      action: 'artifact_reclaimed',
      companyId: artifact.companyId,
      documentId: artifact.documentId,
      details: {
        artifactId: artifact.id,
        reason: artifact.consumedAt ? 'consumed' : 'expired',
      },
      createdAt: at,
    });
    this.logger.debug('Artifact reclaimed', { artifactId: artifact.id });
    return true;
  }

  private query(now: Date): ReclaimQuery {
    return {
      now: now.toISOString(),
      consumedBefore: new Date(now.getTime() - this.graceMs).toISOString(),
    };
  }
}
