import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

/**
 * PROCESS_TYPE is unset, empty, or not one of the recognized values.
 * All three cases share one message; `received` is kept for logs only.
 */
export type ProcessTypeMissingError = Readonly<{
  readonly _tag: 'ProcessTypeMissing';
  readonly received: string | undefined;
  readonly message: string;
}>;

export type SpawnFailedError = Readonly<{
  readonly _tag: 'SpawnFailed';
  readonly command: string;
  /** errno code reported by the OS, e.g. ENOENT */
  readonly code: string | undefined;
  readonly message: string;
}>;

export type EnvFileUnreadableError = Readonly<{
  readonly _tag: 'EnvFileUnreadable';
  readonly path: string;
  readonly message: string;
  readonly cause: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type LaunchError = ProcessTypeMissingError | SpawnFailedError;

export type AppError =
  | ProcessTypeMissingError
  | SpawnFailedError
  | EnvFileUnreadableError
  | UnexpectedError;

/**
 * Branded error type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
