/**
 * Port for registering process signal handlers.
 * This abstracts Node's `process.on` to keep infrastructure concerns out of the launcher.
 */
export type ProcessSignal = NodeJS.Signals;

export type Unsubscribe = () => void;

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: (signal: ProcessSignal) => void): Unsubscribe;
}
