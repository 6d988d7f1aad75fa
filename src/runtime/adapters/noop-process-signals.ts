import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * No-op ProcessSignals implementation for test mode.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: (signal: ProcessSignal) => void): Unsubscribe {
    return () => {
      // no-op
    };
  }
}
