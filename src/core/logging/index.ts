export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, resolveLogLevel } from './types.js';

export { PinoLoggerFactory } from './create-logger.js';
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
export { REDACTION_CONFIG } from './redaction.js';
