import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Installing a listener replaces Node's default disposition for that signal
 * until the returned Unsubscribe runs.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: (signal: ProcessSignal) => void): Unsubscribe {
    const listener = (received: NodeJS.Signals): void => {
      handler(received);
    };
    process.on(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
