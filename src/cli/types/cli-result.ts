/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';
import type { ChildExit } from '../../runtime/ports/process-runner.js';

/**
 * `decorated` output carries icons and colour; `raw` output is the bare text,
 * for callers that parse stdout.
 */
export type CliPresentation = 'decorated' | 'raw';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
  readonly presentation?: CliPresentation;
}

/**
 * Result of a CLI command execution.
 * All commands should return this type.
 *
 * `handoff`: control was given to another program; how that program ended
 * decides how this process ends, and nothing is printed.
 */
export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput }
  | { kind: 'handoff'; exit: ChildExit };

/**
 * Helper to create a success result.
 */
export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/**
 * Helper to create a failure result.
 */
export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

export function handoff(exit: ChildExit): CliResult {
  return { kind: 'handoff', exit };
}
