import type { ErrorHandler } from 'hono';
import { BillingError, ValidationError, noopLogger, errorMessage } from '@billvault/core';
import type { Logger } from '@billvault/core';

const ERROR_STATUSES = [400, 401, 404, 409, 410, 429, 500, 503] as const;

type ErrorStatus = (typeof ERROR_STATUSES)[number];

function isErrorStatus(value: number): value is ErrorStatus {
  return ERROR_STATUSES.some((status) => status === value);
}

/**
 * Global error handler. Domain errors carry their own status and code;
 * 5xx responses never echo internal messages.
 */
export function createErrorHandler(logger: Logger = noopLogger): ErrorHandler {
  return (err, c) => {
    // Invalid JSON body (Hono throws SyntaxError)
    if (err instanceof SyntaxError && err.message.includes('JSON')) {
      return c.json({ error: 'Invalid JSON body', code: 'INVALID_JSON' }, 400);
    }

    if (err instanceof BillingError) {
      const status = isErrorStatus(err.statusCode) ? err.statusCode : 500;
      if (status >= 500) {
        logger.error('Request failed', { path: c.req.path, code: err.code, error: err.message });
        return c.json({ error: 'Document could not be produced', code: err.code }, status);
      }
      if (err instanceof ValidationError) {
        return c.json({ error: err.message, code: err.code, issues: err.issues }, status);
      }
      return c.json({ error: err.message, code: err.code }, status);
    }

    logger.error('Unhandled error', { path: c.req.path, error: errorMessage(err) });
    return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500);
  };
}
