import { pino } from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { resolveLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root logger: JSON lines on stderr, synchronous so nothing is lost when the
 * host unloads the add-in abruptly.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(process.env['CADLINK_LOG_LEVEL']),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
