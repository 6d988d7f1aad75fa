import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatResult, printResult } from '../../../src/cli/output-formatter.js';
import { failure, handoff, success } from '../../../src/cli/types/cli-result.js';

// tests/setup.ts sets chalk.level = 0, so output is plain text.

describe('formatResult', () => {
  it('renders a failure as a single line', () => {
    expect(formatResult(failure('PROCESS_TYPE environment variable not set.'))).toBe(
      '❌ PROCESS_TYPE environment variable not set.'
    );
  });

  it('renders details and suggestions under a decorated message', () => {
    const text = formatResult(success({ message: 'Done', details: ['one'], suggestions: ['try two'] }));

    expect(text).toBe(['✅ Done', '', '  • one', '', '💡 Suggestions:', '  • try two'].join('\n'));
  });

  it('renders raw output without decoration', () => {
    expect(formatResult(success({ message: 'uvicorn main:app', details: ['second'], presentation: 'raw' }))).toBe(
      'uvicorn main:app\nsecond'
    );
  });

  it('renders nothing for a handoff or an empty success', () => {
    expect(formatResult(handoff({ kind: 'exited', code: 0 }))).toBe('');
    expect(formatResult(success())).toBe('');
  });
});

describe('printResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes failures to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult(failure('PROCESS_TYPE environment variable not set.'));

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('❌ PROCESS_TYPE environment variable not set.');
    expect(log).not.toHaveBeenCalled();
  });

  it('writes successes to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult(success({ message: 'celery -A celery_app.celery worker', presentation: 'raw' }));

    expect(log).toHaveBeenCalledWith('celery -A celery_app.celery worker');
  });

  it('writes nothing for a handoff', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult(handoff({ kind: 'signaled', signal: 'SIGTERM' }));

    expect(error).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });
});
