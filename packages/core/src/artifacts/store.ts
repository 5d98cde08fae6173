import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import type { DatabaseAdapter } from '../types/database.js';
import type { RenderedArtifact } from '../types/artifact.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import { sha256 } from '../utils/hash.js';
import { ArtifactNotFoundError, ValidationError } from '../errors/index.js';
import { isMissing } from '../render/assets.js';

export const DEFAULT_ARTIFACT_TTL_SECONDS = 300;
export const DEFAULT_READ_DRAIN_MS = 5_000;

const SAFE_ID = /^[A-Za-z0-9_-]{1,128}$/;

export interface ArtifactStoreOptions {
  /** Directory all artifacts live under */
  root: string;
  artifactTtlSeconds?: number;
  /** Upper bound on how long `remove` waits for in-flight reads */
  readDrainMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface PersistInput {
  companyId: string;
  documentId: string;
  snapshotId: string;
  templateId: string;
  brandingFingerprint: string;
  bytes: Buffer;
}

export interface ReuseQuery {
  documentId: string;
  snapshotId: string;
  templateId: string;
  brandingFingerprint: string;
}

interface ReadTracker {
  count: number;
  drained: Array<() => void>;
}

export function assertSafeId(value: string, field: string): void {
  if (!SAFE_ID.test(value)) {
    throw new ValidationError(`Invalid ${field}`, [`${field}: only letters, digits, "-" and "_" are allowed`]);
  }
}

/**
 * Local filesystem store for rendered PDFs.
 *
 * Layout: `<root>/<companyId>/<documentId>/<artifactId>.pdf`. Bytes are
 * written to a `.partial` sibling and renamed into place, so a reader never
 * sees a truncated file.
 */
export class ArtifactStore {
  private readonly db: DatabaseAdapter;
  private readonly root: string;
  private readonly ttlMs: number;
  private readonly readDrainMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly reads = new Map<string, ReadTracker>();

  constructor(db: DatabaseAdapter, options: ArtifactStoreOptions) {
    if (!isAbsolute(options.root)) {
      throw new ValidationError('Artifact root must be an absolute path', ['root: must be absolute']);
    }
    this.db = db;
    this.root = resolve(options.root);
    this.ttlMs = (options.artifactTtlSeconds ?? DEFAULT_ARTIFACT_TTL_SECONDS) * 1000;
    this.readDrainMs = options.readDrainMs ?? DEFAULT_READ_DRAIN_MS;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  async persist(input: PersistInput): Promise<RenderedArtifact> {
    assertSafeId(input.companyId, 'companyId');
    assertSafeId(input.documentId, 'documentId');

    const id = randomUUID();
    const storagePath = join(input.companyId, input.documentId, `${id}.pdf`);
    const target = this.resolvePath(storagePath);
    const partial = `${target}.partial`;

    await mkdir(dirname(target), { recursive: true });
    try {
      await writeFile(partial, input.bytes);
      await rename(partial, target);
    } catch (error) {
      await rm(partial, { force: true });
      this.logger.error('Failed to write artifact', { artifactId: id, error: errorMessage(error) });
      throw error;
    }

    const createdAt = this.now();
    const artifact: RenderedArtifact = {
      id,
      companyId: input.companyId,
      documentId: input.documentId,
      snapshotId: input.snapshotId,
      templateId: input.templateId,
      brandingFingerprint: input.brandingFingerprint,
      storagePath,
      byteSize: input.bytes.length,
      checksum: sha256(input.bytes),
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.ttlMs).toISOString(),
      consumedAt: null,
      deletedAt: null,
    };

    let stored: RenderedArtifact;
    try {
      stored = await this.db.insertArtifactSuperseding(artifact);
    } catch (error) {
      await rm(target, { force: true });
      this.logger.error('Failed to record artifact', { artifactId: id, error: errorMessage(error) });
      throw error;
    }

    if (stored.id !== id) {
      // A concurrent render of the same snapshot, template and branding got there first
      await rm(target, { force: true });
      this.logger.debug('Discarded duplicate render', { artifactId: id, reusedArtifactId: stored.id });
      return stored;
    }

    this.logger.info('Artifact stored', {
      artifactId: id,
      documentId: input.documentId,
      byteSize: artifact.byteSize,
    });
    return artifact;
  }

  /**
   * A live artifact rendered from the same snapshot, template and branding,
   * or null when a fresh render is needed.
   */
  async findReusable(query: ReuseQuery): Promise<RenderedArtifact | null> {
    const live = await this.db.getLiveArtifacts(
      query.documentId,
      query.snapshotId,
      this.now().toISOString(),
    );
    return (
      live.find(
        (artifact) =>
          artifact.templateId === query.templateId &&
          artifact.brandingFingerprint === query.brandingFingerprint,
      ) ?? null
    );
  }

  async read(artifact: RenderedArtifact): Promise<Buffer> {
    if (artifact.deletedAt) throw new ArtifactNotFoundError(artifact.id);

    const tracker = this.reads.get(artifact.id) ?? { count: 0, drained: [] };
    tracker.count += 1;
    this.reads.set(artifact.id, tracker);

    try {
      return await readFile(this.resolvePath(artifact.storagePath));
    } catch (error) {
      if (isMissing(error)) throw new ArtifactNotFoundError(artifact.id);
      throw error;
    } finally {
      tracker.count -= 1;
      if (tracker.count === 0) {
        this.reads.delete(artifact.id);
        for (const notify of tracker.drained) notify();
      }
    }
  }

  /**
   * Unlink the artifact's bytes once in-flight reads finish (bounded by
   * `readDrainMs`). A file that is already gone counts as removed.
   */
  async remove(artifact: RenderedArtifact): Promise<void> {
    await this.drainReads(artifact.id);
    try {
      await rm(this.resolvePath(artifact.storagePath));
    } catch (error) {
      if (!isMissing(error)) throw error;
      this.logger.debug('Artifact file already gone', { artifactId: artifact.id });
    }
  }

  private drainReads(artifactId: string): Promise<void> {
    const tracker = this.reads.get(artifactId);
    if (!tracker) return Promise.resolve();

    return new Promise<void>((done) => {
      const timer = setTimeout(() => {
        this.logger.warn('Removing artifact with reads still in flight', {
          artifactId,
          readDrainMs: this.readDrainMs,
        });
        done();
      }, this.readDrainMs);
      tracker.drained.push(() => {
        clearTimeout(timer);
        done();
      });
    });
  }

  private resolvePath(storagePath: string): string {
    const full = resolve(this.root, storagePath);
    const rel = relative(this.root, full);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new ValidationError('Artifact path escapes the storage root', ['storagePath: invalid']);
    }
    return full;
  }
}
