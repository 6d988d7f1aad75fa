import type { Logger } from '../../src/core/logging/index.js';

export type FakeLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: FakeLogLevel;
  readonly obj: object;
  readonly msg: string;
}

/**
 * Records the `(bindings, message)` calls the launcher makes.
 */
export class FakeLogger {
  readonly entries: LogEntry[] = [];

  debug(obj: object, msg: string): void {
    this.entries.push({ level: 'debug', obj, msg });
  }

  info(obj: object, msg: string): void {
    this.entries.push({ level: 'info', obj, msg });
  }

  warn(obj: object, msg: string): void {
    this.entries.push({ level: 'warn', obj, msg });
  }

  error(obj: object, msg: string): void {
    this.entries.push({ level: 'error', obj, msg });
  }

  /** View this fake through the pino type the code under test expects. */
  asLogger(): Logger {
    return this as unknown as Logger;
  }

  hasEntry(level: FakeLogLevel, msgContains: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg.includes(msgContains));
  }

  getEntries(level: FakeLogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}
