import type { ProcessSignal } from './process-signals.js';

export type ShutdownSignal = Exclude<ProcessSignal, 'exit'>;

export type ShutdownEvent =
  | { kind: 'shutdown_requested'; signal: ShutdownSignal }
  | { kind: 'host_unloading' };

export type Unsubscribe = () => void;

/**
 * Typed "please stop" channel between whoever notices the request (a signal,
 * the host unloading the add-in) and the composition root that owns teardown.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
