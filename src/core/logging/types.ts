import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - matches pino's Logger exactly.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ processType: 'web' }, 'Launching target');
 *   logger.error({ err: error }, 'Spawn failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_ENV = 'LAUNCHER_LOG_LEVEL';
