export { createServer } from './app.js';
export type { ServerOptions, AppEnv } from './types.js';
export { getServerConfig, type ServerConfig } from './config.js';
export { createErrorHandler } from './middleware/error.js';
export { bearerAuth, isPublicPath } from './middleware/auth.js';
export { actorMiddleware, ANONYMOUS_ACTOR } from './middleware/actor.js';
export { rateLimitMiddleware, clientKey, type RateLimitConfig } from './middleware/rate-limit.js';
export { documentRoutes } from './routes/documents.js';
export { downloadRoutes } from './routes/downloads.js';
export { maintenanceRoutes } from './routes/maintenance.js';
