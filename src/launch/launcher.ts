import type { ResultAsync } from 'neverthrow';
import type { LaunchError, SpawnFailedError } from '../errors/app-error.js';
import type { ChildExit, ProcessRunner } from '../runtime/ports/process-runner.js';
import type { Logger } from '../core/logging/index.js';
import type { LaunchEnv } from './process-type.js';
import { resolveLaunchPlan, toCommandSpec } from './launch-plan.js';

export interface LauncherDeps {
  readonly runner: ProcessRunner;
  readonly logger: Logger;
}

/**
 * Resolve the target for `env` and hand control to it.
 *
 * Resolves with how the target ended; its exit status is authoritative and is
 * not interpreted here.
 */
export function launch(env: LaunchEnv, deps: LauncherDeps): ResultAsync<ChildExit, LaunchError> {
  return resolveLaunchPlan(env).asyncAndThen((plan) => {
    deps.logger.info(
      { processType: plan.target.processType, command: plan.target.command, args: plan.target.args },
      'Handing off to target'
    );
    return deps.runner.run(toCommandSpec(plan));
  });
}

/**
 * Status a POSIX shell reports when `exec` cannot start a program.
 */
export function spawnFailureExitStatus(error: SpawnFailedError): number {
  switch (error.code) {
    case 'ENOENT':
      return 127;
    case 'EACCES':
      return 126;
    default:
      return 1;
  }
}
