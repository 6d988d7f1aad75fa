import type { Result } from 'neverthrow';
import type { ProcessTypeMissingError } from '../errors/app-error.js';
import type { CommandSpec } from '../runtime/ports/process-runner.js';
import { parseProcessType } from './process-type.js';
import type { LaunchEnv } from './process-type.js';
import { LAUNCH_TARGETS } from './targets.js';
import type { LaunchTarget } from './targets.js';

/**
 * What the launcher is about to become.
 * `env` is passed through to the target untouched.
 */
export interface LaunchPlan {
  readonly target: LaunchTarget;
  readonly env: LaunchEnv;
}

export function resolveLaunchPlan(env: LaunchEnv): Result<LaunchPlan, ProcessTypeMissingError> {
  return parseProcessType(env).map((processType): LaunchPlan => ({
    target: LAUNCH_TARGETS[processType],
    env,
  }));
}

export function toCommandSpec(plan: LaunchPlan): CommandSpec {
  return {
    command: plan.target.command,
    args: plan.target.args,
    env: plan.env,
  };
}
