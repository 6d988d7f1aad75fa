/**
 * Port for terminating the current process.
 * This should only be used by composition roots / entrypoints.
 *
 * `code` and `signal` mirror how a handed-off child process ended, so the
 * launcher's own termination is indistinguishable from the child's.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'code'; code: number }
  | { kind: 'signal'; signal: NodeJS.Signals };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
