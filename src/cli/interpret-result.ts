/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode } from './types/exit-code.js';
import type { ChildExit } from '../runtime/ports/process-runner.js';
import type { ExitCode as ProcessExitCode, ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Mirror a handed-off child's end onto this process.
 */
export function toMirroredExitCode(exit: ChildExit): ProcessExitCode {
  switch (exit.kind) {
    case 'exited':
      return { kind: 'code', code: exit.code };
    case 'signaled':
      return { kind: 'signal', signal: exit.signal };
  }
}

/**
 * Interpret a CLI result and handle termination via ProcessTerminator.
 * Use this when DI container is available.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator
): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Don't explicitly exit on success; let the process end naturally.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));

    case 'handoff':
      terminator.terminate(toMirroredExitCode(result.exit));
  }
}

/**
 * Interpret a CLI result without DI (for commands that never build the container).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  interpretCliResult(result, new NodeProcessTerminator());
}
