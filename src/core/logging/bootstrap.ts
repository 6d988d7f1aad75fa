import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS, LOG_LEVEL_ENV } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized
 * (container setup, env-file loading).
 *
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

function bootstrapLevel(): LogLevel {
  const raw = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'silent';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: bootstrapLevel(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
