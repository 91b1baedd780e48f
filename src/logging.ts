/**
 * Level-filtered logging for the HTTP client.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({ baseUrl, logger: console, logLevel: 'debug' });
 * ```
 *
 * @module
 */

/** Logger shape accepted by the client. Defaults to `console`. */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_PREFIX = '[retry]';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Wrap `logger` so that messages below `level` are dropped and every
 * message carries the `[retry]` prefix.
 */
export function createLogger(logger: Logger = console, level: LogLevel = 'warn'): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_RANK[messageLevel] >= LEVEL_RANK[level];

  return {
    debug: (message?: unknown, ...args: unknown[]) => {
      if (enabled('debug')) logger.debug(`${LOG_PREFIX} ${String(message)}`, ...args);
    },
    info: (message?: unknown, ...args: unknown[]) => {
      if (enabled('info')) logger.info(`${LOG_PREFIX} ${String(message)}`, ...args);
    },
    warn: (message?: unknown, ...args: unknown[]) => {
      if (enabled('warn')) logger.warn(`${LOG_PREFIX} ${String(message)}`, ...args);
    },
    error: (message?: unknown, ...args: unknown[]) => {
      if (enabled('error')) logger.error(`${LOG_PREFIX} ${String(message)}`, ...args);
    },
  };
}
