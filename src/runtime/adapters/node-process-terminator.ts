import os from 'os';
import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

/**
 * Shell convention for a process killed by a signal: 128 + signal number.
 */
export function signalExitStatus(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'success':
        process.exit(0);
      case 'failure':
        process.exit(1);
      case 'code':
        process.exit(code.code);
      case 'signal':
        return this.reraise(code.signal);
      default:
        return assertNever(code);
    }
  }

  private reraise(signal: NodeJS.Signals): never {
    // Restore the default disposition so the signal actually ends this process.
    process.removeAllListeners(signal);
    process.kill(process.pid, signal);
    process.exit(signalExitStatus(signal));
  }
}
