import { z } from 'zod';
import { TEMPLATE_IDS } from '@billvault/core';

const ServerConfigSchema = z.object({
  port: z.number().int().positive().default(3456),
  // Storage
  databasePath: z.string().min(1).default('.data/billvault.sqlite'),
  artifactRoot: z.string().min(1).default('.data/artifacts'),
  // HTTP
  publicBaseUrl: z.string().url().default('http://localhost:3456'),
  apiKey: z.string().min(1).optional(),
  downloadRateLimit: z.number().int().positive().default(30),
  downloadRateWindowMs: z.number().int().positive().default(60_000),
  // Artifacts & credentials
  downloadTtlSeconds: z.number().int().positive().default(300),
  consumedGraceSeconds: z.number().int().nonnegative().default(60),
  renderTimeoutMs: z.number().int().positive().default(10_000),
  readDrainMs: z.number().int().nonnegative().default(5_000),
  defaultTemplate: z.enum(TEMPLATE_IDS).default('classic'),
  // Maintenance
  auditRetentionDays: z.number().int().positive().default(30),
  sweepIntervalSeconds: z.number().int().positive().default(60),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

function intEnv(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

/** Read and validate server configuration from the environment. Throws a ZodError on bad values. */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return ServerConfigSchema.parse({
    port: intEnv(env['PORT']),
    databasePath: env['DATABASE_PATH'] || undefined,
    artifactRoot: env['ARTIFACT_ROOT'] || undefined,
    publicBaseUrl: env['PUBLIC_BASE_URL'] || undefined,
    apiKey: env['API_KEY'] || undefined,
    downloadRateLimit: intEnv(env['DOWNLOAD_RATE_LIMIT']),
    downloadRateWindowMs: intEnv(env['DOWNLOAD_RATE_WINDOW_MS']),
    downloadTtlSeconds: intEnv(env['DOWNLOAD_TTL_SECONDS']),
    consumedGraceSeconds: intEnv(env['CONSUMED_GRACE_SECONDS']),
    renderTimeoutMs: intEnv(env['RENDER_TIMEOUT_MS']),
    readDrainMs: intEnv(env['READ_DRAIN_MS']),
    defaultTemplate: env['DEFAULT_TEMPLATE'] || undefined,
    auditRetentionDays: intEnv(env['AUDIT_RETENTION_DAYS']),
    sweepIntervalSeconds: intEnv(env['SWEEP_INTERVAL_SECONDS']),
  });
}
