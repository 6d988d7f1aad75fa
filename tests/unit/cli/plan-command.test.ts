import { describe, it, expect } from 'vitest';
import { executePlanCommand } from '../../../src/cli/commands/plan.js';

const noFile = (): string => '';

describe('executePlanCommand', () => {
  it('prints the web command line raw', () => {
    const result = executePlanCommand({ env: { PROCESS_TYPE: 'web' }, readFile: noFile });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'uvicorn main:app --host 0.0.0.0 --port 8000', presentation: 'raw' },
    });
  });

  it('prints the worker command line raw', () => {
    const result = executePlanCommand({ env: { PROCESS_TYPE: 'worker' }, readFile: noFile });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'celery -A celery_app.celery worker --loglevel=info --pool=solo', presentation: 'raw' },
    });
  });

  it('fails like start when PROCESS_TYPE is not recognized', () => {
    const result = executePlanCommand({ env: { PROCESS_TYPE: 'cron' }, readFile: noFile });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: 'PROCESS_TYPE environment variable not set.' },
    });
  });

  it('uses the env file when asked', () => {
    const result = executePlanCommand(
      { env: {}, readFile: () => 'PROCESS_TYPE=web' },
      { envFile: '.env' }
    );

    expect(result.kind === 'success' && result.output?.message).toBe('uvicorn main:app --host 0.0.0.0 --port 8000');
  });
});
