import type { ResultAsync } from 'neverthrow';
import type { SpawnFailedError } from '../../errors/app-error.js';

/**
 * A fully resolved external command.
 * `env` is handed to the child as-is.
 */
export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string | undefined>>;
}

/**
 * How a child process ended.
 */
export type ChildExit =
  | { readonly kind: 'exited'; readonly code: number }
  | { readonly kind: 'signaled'; readonly signal: NodeJS.Signals };

/**
 * Port for handing control to an external program and waiting for it to end.
 * Adapters inherit stdio so the child owns the terminal for its lifetime.
 */
export interface ProcessRunner {
  run(spec: CommandSpec): ResultAsync<ChildExit, SpawnFailedError>;
}
