import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import type { EnvFileUnreadableError } from '../../errors/app-error.js';
import { mergeEnvFile } from '../../launch/env-file.js';
import type { ReadTextFile } from '../../launch/env-file.js';
import type { LaunchEnv } from '../../launch/process-type.js';

/**
 * The environment a command decides on: the process environment, with the
 * optional `--env-file` layered beneath it.
 */
export function resolveCommandEnv(
  env: LaunchEnv,
  envFile: string | undefined,
  readFile: ReadTextFile
): Result<LaunchEnv, EnvFileUnreadableError> {
  return envFile === undefined ? ok(env) : mergeEnvFile(envFile, env, readFile);
}
