// Types
export * from './types/index.js';

// Errors
export {
  BillingError,
  ValidationError,
  DocumentNotFoundError,
  SnapshotNotFoundError,
  ArtifactNotFoundError,
  ArtifactUnavailableError,
  CredentialNotFoundError,
  CredentialExpiredError,
  CredentialConsumedError,
  InvalidTransitionError,
  IntegrityError,
  RenderError,
  RenderTimeoutError,
} from './errors/index.js';

// Database adapters
export { SQLiteAdapter, schema } from './db/index.js';

// Document repository
export { InMemoryDocumentRepository } from './repository/memory.js';

// Snapshots
export {
  SnapshotBuilder,
  buildSnapshot,
  brandingSnapshot,
  type SnapshotBuilderOptions,
  type LockOptions,
} from './snapshot/builder.js';
export { Money, parseDecimal, formatAmount, computeTotals } from './snapshot/money.js';
export { validateDocument } from './snapshot/validation.js';

// Rendering
export * from './render/index.js';

// Artifacts and download credentials
export {
  ArtifactStore,
  DEFAULT_ARTIFACT_TTL_SECONDS,
  type ArtifactStoreOptions,
} from './artifacts/store.js';
export {
  CredentialManager,
  DEFAULT_TOKEN_TTL_SECONDS,
  DEFAULT_CONSUMED_GRACE_SECONDS,
  type CredentialManagerOptions,
  type IssuedCredential,
  type Redemption,
} from './credentials/manager.js';
export { Sweeper, type SweeperOptions, type SweepOptions, type SweepResult } from './sweeper/sweeper.js';

// Lifecycle
export {
  DocumentStateMachine,
  TRANSITIONS,
  canApply,
  isPastDue,
  type DocumentNotifier,
  type StateMachineOptions,
  type OverdueCheckResult,
} from './lifecycle/state-machine.js';

// Engine
export * from './engine/index.js';

// Utilities
export * from './utils/index.js';
