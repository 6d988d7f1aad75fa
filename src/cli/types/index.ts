/**
 * CLI Types - Public API
 */

export type { ExitCode } from './exit-code.js';
export { toProcessExitCode, toNumericExitCode, fromNumericExitCode } from './exit-code.js';

export type { CliOutput, CliPresentation, CliResult } from './cli-result.js';
export { success, failure, handoff } from './cli-result.js';
