import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * Data-first call style:
 *   logger.info({ connectionId }, 'Connection accepted');
 *   logger.error({ err: error, method }, 'Handler failed');
 */
export type Logger = PinoLogger;

/**
 * Creates component-scoped child loggers. Injected through DI.
 */
export interface ILoggerFactory {
  create(component: string): Logger;
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * CADLINK_LOG_LEVEL, case-insensitive. Unknown values fall back to `info`.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? 'info';
}
