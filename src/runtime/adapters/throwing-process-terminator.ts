import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export function describeExitCode(code: ExitCode): string {
  switch (code.kind) {
    case 'success':
    case 'failure':
      return code.kind;
    case 'code':
      return `code ${code.code}`;
    case 'signal':
      return `signal ${code.signal}`;
    default:
      return assertNever(code);
  }
}

/**
 * Test adapter: never exits the process.
 * Useful to catch accidental termination during tests.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${describeExitCode(code)})`);
  }
}
