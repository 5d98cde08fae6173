/**
 * Logger interface. Consumers provide their own implementation
 * (console, pino, winston, etc.). Falls back to no-op if not provided.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Console logger for development. Each line carries an ISO timestamp,
 * the level and the component scope, e.g.
 * `2024-05-01T10:00:00.000Z [INFO] [sweeper] Sweep completed {...}`.
 */
export function createConsoleLogger(scope = 'billvault'): Logger {
  const line = (level: string, message: string) =>
    `${new Date().toISOString()} [${level}] [${scope}] ${message}`;

  return {
    debug(message, data) {
      console.debug(line('DEBUG', message), data ?? '');
    },
    info(message, data) {
      console.info(line('INFO', message), data ?? '');
    },
    warn(message, data) {
      console.warn(line('WARN', message), data ?? '');
    },
    error(message, data) {
      console.error(line('ERROR', message), data ?? '');
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/** Serialize an unknown thrown value for structured log data. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
