import { pino } from 'pino';
import type { Logger } from './types.js';
import { resolveLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists
 * (container setup itself, the CLI entrypoint).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: resolveLogLevel(process.env['CADLINK_LOG_LEVEL']),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
