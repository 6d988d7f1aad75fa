import type { AppError, SpawnFailedError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ProcessTypeMissing':
      return error.message;

    case 'SpawnFailed':
      return `${error.command}: ${spawnFailureReason(error)}`;

    case 'EnvFileUnreadable':
      return `${error.message}: ${safeToString(error.cause)}`;

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function spawnFailureReason(error: SpawnFailedError): string {
  switch (error.code) {
    case 'ENOENT':
      return 'command not found';
    case 'EACCES':
      return 'permission denied';
    default:
      return error.message;
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
