import type { BillingCore, Logger } from '@billvault/core';
import type { RateLimitConfig } from './middleware/rate-limit.js';

/** Hono environment shared by every route group */
export type AppEnv = {
  Variables: {
    /** Acting identity from the X-Actor header, recorded in the audit trail */
    actor: string;
  };
};

export interface ServerOptions {
  core: BillingCore;
  /** Enables bearer auth on management routes when set */
  apiKey?: string;
  /** Falls back to noopLogger */
  logger?: Logger;
  /** Per-client limit on GET /download/:token */
  downloadRateLimit?: RateLimitConfig;
  /** Clock for the maintenance routes */
  now?: () => Date;
}
