import { describe, it, expect, vi, afterEach } from 'vitest';
import { NodeProcessTerminator, signalExitStatus } from '../../../src/runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';

class ExitCalled extends Error {
  constructor(readonly status: string | number | null | undefined) {
    super(`exit(${String(status)})`);
  }
}

describe('signalExitStatus', () => {
  it('is 128 plus the signal number', () => {
    expect(signalExitStatus('SIGINT')).toBe(130);
    expect(signalExitStatus('SIGKILL')).toBe(137);
    expect(signalExitStatus('SIGTERM')).toBe(143);
  });
});

describe('NodeProcessTerminator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const stubExit = () =>
    vi.spyOn(process, 'exit').mockImplementation((status) => {
      throw new ExitCalled(status);
    });

  it('exits 0 for success and 1 for failure', () => {
    const exit = stubExit();
    const terminator = new NodeProcessTerminator();

    expect(() => terminator.terminate({ kind: 'success' })).toThrow(ExitCalled);
    expect(() => terminator.terminate({ kind: 'failure' })).toThrow(ExitCalled);
    expect(exit.mock.calls).toEqual([[0], [1]]);
  });

  it('exits with a mirrored code', () => {
    const exit = stubExit();

    expect(() => new NodeProcessTerminator().terminate({ kind: 'code', code: 42 })).toThrow(ExitCalled);
    expect(exit).toHaveBeenCalledWith(42);
  });

  it('re-raises a mirrored signal on itself, then falls back to 128 + n', () => {
    const exit = stubExit();
    const kill = vi.spyOn(process, 'kill').mockReturnValue(true);
    const removeAll = vi.spyOn(process, 'removeAllListeners').mockReturnValue(process);

    expect(() => new NodeProcessTerminator().terminate({ kind: 'signal', signal: 'SIGTERM' })).toThrow(ExitCalled);
    expect(removeAll).toHaveBeenCalledWith('SIGTERM');
    expect(kill).toHaveBeenCalledWith(process.pid, 'SIGTERM');
    expect(exit).toHaveBeenCalledWith(143);
  });
});

describe('ThrowingProcessTerminator', () => {
  it('throws instead of exiting', () => {
    expect(() => new ThrowingProcessTerminator().terminate({ kind: 'signal', signal: 'SIGINT' })).toThrow(
      '[ProcessTerminator] terminate(signal SIGINT)'
    );
    expect(() => new ThrowingProcessTerminator().terminate({ kind: 'code', code: 5 })).toThrow(
      '[ProcessTerminator] terminate(code 5)'
    );
  });
});
