/**
 * Targets Command
 *
 * Lists every recognized PROCESS_TYPE and the command it runs.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { LAUNCH_TARGETS, formatCommandLine } from '../../launch/targets.js';
import type { LaunchTarget } from '../../launch/targets.js';
import { PROCESS_TYPES, PROCESS_TYPE_ENV } from '../../launch/process-type.js';

export function executeTargetsCommand(): CliResult {
  const targets: readonly LaunchTarget[] = PROCESS_TYPES.map((processType) => LAUNCH_TARGETS[processType]);

  return success({
    message: 'Recognized process types',
    details: targets.flatMap((target) => [
      `${target.processType}: ${target.description}`,
      `   ${formatCommandLine(target)}`,
    ]),
    suggestions: [`Set ${PROCESS_TYPE_ENV} to one of: ${PROCESS_TYPES.join(', ')}`],
  });
}
