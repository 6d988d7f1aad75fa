import { parse } from 'dotenv';
import { Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { EnvFileUnreadableError } from '../errors/app-error.js';
import type { LaunchEnv } from './process-type.js';

export type ReadTextFile = (path: string) => string;

/**
 * Layer a dotenv file beneath `env`. Variables already present in `env` win.
 */
export function mergeEnvFile(
  path: string,
  env: LaunchEnv,
  readFile: ReadTextFile
): Result<LaunchEnv, EnvFileUnreadableError> {
  const read = Result.fromThrowable(
    () => readFile(path),
    (cause) => Err.envFileUnreadable(path, cause)
  );
  return read().map((content): LaunchEnv => ({ ...parse(content), ...env }));
}
