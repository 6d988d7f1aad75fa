/**
 * Plan Command
 *
 * Prints the command line `start` would run, without running it.
 * Output is raw so scripts can consume it.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import { formatAppError } from '../../errors/formatter.js';
import { resolveLaunchPlan } from '../../launch/launch-plan.js';
import type { LaunchEnv } from '../../launch/process-type.js';
import type { ReadTextFile } from '../../launch/env-file.js';
import { formatCommandLine } from '../../launch/targets.js';
import { resolveCommandEnv } from './command-env.js';

export interface PlanCommandDeps {
  readonly env: LaunchEnv;
  readonly readFile: ReadTextFile;
}

export interface PlanCommandOptions {
  readonly envFile?: string;
}

export function executePlanCommand(deps: PlanCommandDeps, options: PlanCommandOptions = {}): CliResult {
  return resolveCommandEnv(deps.env, options.envFile, deps.readFile)
    .andThen(resolveLaunchPlan)
    .match(
      (plan) => success({ message: formatCommandLine(plan.target), presentation: 'raw' }),
      (error) => failure(formatAppError(error))
    );
}
