/**
 * Start Command
 *
 * Reads PROCESS_TYPE and hands the process over to the matching target.
 * Pure function with dependency injection; the composition root turns the
 * returned CliResult into process exit.
 *
 * `env` is already merged with any `--env-file`: the composition root needs
 * it before the container exists, to read launcher settings from it.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, handoff } from '../types/cli-result.js';
import { fromNumericExitCode } from '../types/exit-code.js';
import type { LaunchError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { ProcessRunner } from '../../runtime/ports/process-runner.js';
import type { Logger } from '../../core/logging/index.js';
import { launch, spawnFailureExitStatus } from '../../launch/launcher.js';
import type { LaunchEnv } from '../../launch/process-type.js';

export interface StartCommandDeps {
  readonly env: LaunchEnv;
  readonly runner: ProcessRunner;
  readonly logger: Logger;
}

export async function executeStartCommand(deps: StartCommandDeps): Promise<CliResult> {
  const outcome = await launch(deps.env, { runner: deps.runner, logger: deps.logger });

  return outcome.match(
    (exit) => handoff(exit),
    (error) => toFailure(error, deps.logger)
  );
}

function toFailure(error: LaunchError, logger: Logger): CliResult {
  switch (error._tag) {
    case 'ProcessTypeMissing':
      logger.warn({ received: error.received }, 'Unrecognized PROCESS_TYPE');
      return failure(formatAppError(error));

    case 'SpawnFailed':
      logger.error({ command: error.command, code: error.code }, 'Target failed to start');
      return failure(formatAppError(error), {
        exitCode: fromNumericExitCode(spawnFailureExitStatus(error)),
      });
  }
}
