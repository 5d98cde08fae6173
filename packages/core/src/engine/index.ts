export { DocumentEngine, downloadFilename, DEFAULT_AUDIT_RETENTION_DAYS } from './engine.js';
export type {
  DocumentEngineComponents,
  DocumentEngineOptions,
  GenerateOptions,
  GeneratedLink,
  DownloadResult,
  DocumentHistory,
} from './engine.js';
export { createBillingCore, SYSTEM_ACTOR } from './create.js';
export type { BillingCore, BillingCoreOptions } from './create.js';
