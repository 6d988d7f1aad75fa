export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, LOG_LEVEL_ENV } from './types.js';

// DI-registered factory
export { PinoLoggerFactory } from './create-logger.js';

// Pre-container logging
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
