import type { DatabaseAdapter } from '../types/database.js';
import type { DocumentRepository } from '../types/document.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import { SnapshotBuilder } from '../snapshot/builder.js';
import { Renderer } from '../render/renderer.js';
import type { AssetLoader } from '../render/assets.js';
import type { TemplateId } from '../render/templates.js';
import { ArtifactStore } from '../artifacts/store.js';
import { CredentialManager } from '../credentials/manager.js';
import { Sweeper } from '../sweeper/sweeper.js';
import type { DocumentNotifier } from '../lifecycle/state-machine.js';
import { DocumentStateMachine } from '../lifecycle/state-machine.js';
import { DocumentEngine } from './engine.js';

export const SYSTEM_ACTOR = 'system';

export interface BillingCoreOptions {
  db: DatabaseAdapter;
  repository: DocumentRepository;
  artifactRoot: string;
  publicBaseUrl?: string;
  defaultTemplate?: TemplateId;
  /** Lifetime of both rendered artifacts and their download links */
  downloadTtlSeconds?: number;
  consumedGraceSeconds?: number;
  renderTimeoutMs?: number;
  readDrainMs?: number;
  auditRetentionDays?: number;
  notifier?: DocumentNotifier;
  assets?: AssetLoader;
  /** Reclaim consumed artifacts on a timer after the grace period (default true) */
  scheduleReclaims?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface BillingCore {
  builder: SnapshotBuilder;
  renderer: Renderer;
  store: ArtifactStore;
  credentials: CredentialManager;
  sweeper: Sweeper;
  lifecycle: DocumentStateMachine;
  engine: DocumentEngine;
}

/** Wire every component of the core onto one database and artifact root. */
export function createBillingCore(options: BillingCoreOptions): BillingCore {
  const logger = options.logger ?? noopLogger;
  const { db, repository, now } = options;

  const builder = new SnapshotBuilder(db, repository, { logger, now });
  const renderer = new Renderer({
    assets: options.assets,
    logger,
    renderTimeoutMs: options.renderTimeoutMs,
  });
  const store = new ArtifactStore(db, {
    root: options.artifactRoot,
    artifactTtlSeconds: options.downloadTtlSeconds,
    readDrainMs: options.readDrainMs,
    logger,
    now,
  });
  const sweeper = new Sweeper(db, store, {
    consumedGraceSeconds: options.consumedGraceSeconds,
    logger,
  });

  const scheduleReclaim = (artifactId: string, delayMs: number) => {
    const timer = setTimeout(() => {
      sweeper.reclaim(SYSTEM_ACTOR, artifactId, now ? now() : new Date()).catch((error: unknown) => {
        logger.error('Scheduled reclaim failed', { artifactId, error: errorMessage(error) });
      });
    }, delayMs);
    timer.unref();
  };

  const credentials = new CredentialManager(db, store, {
    tokenTtlSeconds: options.downloadTtlSeconds,
    consumedGraceSeconds: options.consumedGraceSeconds,
    scheduleReclaim: options.scheduleReclaims === false ? undefined : scheduleReclaim,
    logger,
    now,
  });
  const lifecycle = new DocumentStateMachine(db, builder, {
    notifier: options.notifier,
    logger,
    now,
  });
  const engine = new DocumentEngine(
    { db, repository, builder, renderer, store, credentials, lifecycle },
    {
      publicBaseUrl: options.publicBaseUrl,
      defaultTemplate: options.defaultTemplate,
      auditRetentionDays: options.auditRetentionDays,
      logger,
      now,
    },
  );

  return { builder, renderer, store, credentials, sweeper, lifecycle, engine };
}
