import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { ChildExit, CommandSpec, ProcessRunner } from '../../../src/runtime/ports/process-runner.js';
import type { SpawnFailedError } from '../../../src/errors/app-error.js';

export type FakeRunOutcome =
  | { kind: 'exit'; exit: ChildExit }
  | { kind: 'spawn_failed'; error: SpawnFailedError };

/**
 * Records every CommandSpec it is asked to run and answers with a fixed outcome.
 */
export class RecordingProcessRunner implements ProcessRunner {
  readonly runs: CommandSpec[] = [];

  constructor(private outcome: FakeRunOutcome = { kind: 'exit', exit: { kind: 'exited', code: 0 } }) {}

  willReturn(outcome: FakeRunOutcome): void {
    this.outcome = outcome;
  }

  run(spec: CommandSpec): ResultAsync<ChildExit, SpawnFailedError> {
    this.runs.push(spec);
    return this.outcome.kind === 'exit' ? okAsync(this.outcome.exit) : errAsync(this.outcome.error);
  }
}
