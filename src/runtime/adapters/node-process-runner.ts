import { spawn } from 'child_process';
import { ResultAsync, err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { ChildExit, CommandSpec, ProcessRunner } from '../ports/process-runner.js';
import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';
import type { SpawnFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { Logger } from '../../core/logging/index.js';

/**
 * Signals relayed to the child while it runs.
 * Node has no exec(), so the launcher stays resident as a thin parent and
 * passes these through instead of dying on them.
 */
export const FORWARDED_SIGNALS: readonly ProcessSignal[] = ['SIGTERM', 'SIGINT', 'SIGHUP', 'SIGQUIT'];

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Spawn-and-wait ProcessRunner backed by `child_process.spawn`.
 * The child inherits stdin/stdout/stderr and the given environment.
 */
export class NodeProcessRunner implements ProcessRunner {
  constructor(
    private readonly signals: ProcessSignals,
    private readonly logger: Logger
  ) {}

  run(spec: CommandSpec): ResultAsync<ChildExit, SpawnFailedError> {
    return new ResultAsync(this.spawnAndWait(spec));
  }

  private spawnAndWait(spec: CommandSpec): Promise<Result<ChildExit, SpawnFailedError>> {
    return new Promise((resolve) => {
      const child = spawn(spec.command, [...spec.args], { stdio: 'inherit', env: spec.env });
      this.logger.debug({ command: spec.command, args: spec.args, pid: child.pid }, 'Spawned child process');

      const unsubscribes = FORWARDED_SIGNALS.map((signal) =>
        this.signals.on(signal, (received) => {
          this.logger.debug({ signal: received, pid: child.pid }, 'Forwarding signal to child');
          child.kill(received);
        })
      );
      const release = (): void => {
        unsubscribes.forEach((unsubscribe) => unsubscribe());
      };

      child.once('error', (error: Error) => {
        release();
        resolve(err(Err.spawnFailed(spec.command, errnoCode(error), error.message)));
      });

      child.once('exit', (code, signal) => {
        release();
        this.logger.debug({ code, signal }, 'Child process ended');
        const exit: ChildExit = signal ? { kind: 'signaled', signal } : { kind: 'exited', code: code ?? 0 };
        resolve(ok(exit));
      });
    });
  }
}
