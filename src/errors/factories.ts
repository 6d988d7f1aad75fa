import type {
  AppError,
  EnvFileUnreadableError,
  ProcessTypeMissingError,
  SpawnFailedError,
  UnexpectedError,
} from './app-error.js';

export const PROCESS_TYPE_MISSING_MESSAGE = 'PROCESS_TYPE environment variable not set.';

export const Err = {
  processTypeMissing: (received: string | undefined): ProcessTypeMissingError => ({
    _tag: 'ProcessTypeMissing',
    received,
    message: PROCESS_TYPE_MISSING_MESSAGE,
  }),

  spawnFailed: (command: string, code: string | undefined, message: string): SpawnFailedError => ({
    _tag: 'SpawnFailed',
    command,
    code,
    message,
  }),

  envFileUnreadable: (path: string, cause: unknown): EnvFileUnreadableError => ({
    _tag: 'EnvFileUnreadable',
    path,
    message: `Cannot read env file ${path}`,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
