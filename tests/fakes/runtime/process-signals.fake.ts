import type { ProcessSignal, ProcessSignals, Unsubscribe } from '../../../src/runtime/ports/process-signals.js';

type SignalHandler = (signal: ProcessSignal) => void;

/**
 * In-memory ProcessSignals: handlers are stored and fired by `emit`.
 */
export class FakeProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ProcessSignal, Set<SignalHandler>>();

  on(signal: ProcessSignal, handler: SignalHandler): Unsubscribe {
    const set = this.handlers.get(signal) ?? new Set<SignalHandler>();
    set.add(handler);
    this.handlers.set(signal, set);
    return () => {
      set.delete(handler);
    };
  }

  emit(signal: ProcessSignal): void {
    for (const handler of this.handlers.get(signal) ?? []) {
      handler(signal);
    }
  }

  listenerCount(signal?: ProcessSignal): number {
    if (signal) return this.handlers.get(signal)?.size ?? 0;
    let total = 0;
    this.handlers.forEach((set) => {
      total += set.size;
    });
    return total;
  }
}
