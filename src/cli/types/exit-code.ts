import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }            // 0 - successful execution
  | { kind: 'general_error' }      // 1 - general errors
  | { kind: 'cannot_execute' }     // 126 - command found but not executable
  | { kind: 'command_not_found' }; // 127 - command not found

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'cannot_execute':
    case 'command_not_found':
      return { kind: 'code', code: toNumericExitCode(exitCode) };
    default:
      return assertNever(exitCode);
  }
}

/**
 * Convert ExitCode to numeric value for raw process.exit().
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'cannot_execute':
      return 126;
    case 'command_not_found':
      return 127;
    default:
      return assertNever(exitCode);
  }
}

/**
 * Reads back the spawn-failure statuses (126, 127); anything else is a general error.
 */
export function fromNumericExitCode(code: number): ExitCode {
  switch (code) {
    case 126:
      return { kind: 'cannot_execute' };
    case 127:
      return { kind: 'command_not_found' };
    default:
      return { kind: 'general_error' };
  }
}
