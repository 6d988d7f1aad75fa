#!/usr/bin/env node
/**
 * process-launcher CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO launch logic
 *
 * Launch logic lives in src/launch/*.ts, command logic in src/cli/commands/*.ts
 */

import { Command } from 'commander';
import fs from 'fs';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessRunner } from './runtime/ports/process-runner.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { Err, formatAppError } from './errors/index.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeStartCommand,
  executePlanCommand,
  executeTargetsCommand,
  resolveCommandEnv,
} from './cli/commands/index.js';

interface EnvFileOptions {
  readonly envFile?: string;
}

const readFile = (p: string): string => fs.readFileSync(p, 'utf-8');

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('process-launcher')
  .description('Container entrypoint: becomes the web server or the task-queue worker according to PROCESS_TYPE')
  .version('1.0.0');

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (pure)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('targets')
  .description('List recognized PROCESS_TYPE values and the command each runs')
  .action(() => {
    interpretCliResultWithoutDI(executeTargetsCommand());
  });

program
  .command('plan')
  .description('Print the command that start would run, without running it')
  .option('--env-file <path>', 'Load variables from a dotenv file; existing variables win')
  .action((options: EnvFileOptions) => {
    const result = executePlanCommand({ env: process.env, readFile }, { envFile: options.envFile });
    interpretCliResultWithoutDI(result);
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI (need runtime ports)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('start', { isDefault: true })
  .description('Hand this process over to the target selected by PROCESS_TYPE (default)')
  .option('--env-file <path>', 'Load variables from a dotenv file; existing variables win')
  .action(async (options: EnvFileOptions) => {
    // The env file feeds launcher settings too, so it is merged before the container is built.
    const env = resolveCommandEnv(process.env, options.envFile, readFile);
    if (env.isErr()) {
      interpretCliResultWithoutDI(failure(formatAppError(env.error)));
      return;
    }

    initializeContainer({ runtimeMode: { kind: 'cli' }, env: env.value });

    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const loggerFactory = container.resolve<ILoggerFactory>(DI.Logging.Factory);

    const result = await executeStartCommand({
      env: env.value,
      runner: container.resolve<ProcessRunner>(DI.Runtime.ProcessRunner),
      logger: loggerFactory.create('launcher'),
    });

    interpretCliResult(result, terminator);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatAppError(Err.unexpected('process-launcher crashed', error)));
  process.exit(1);
});
