import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Used when something else owns the process: tests, or a host application
 * that has loaded the add-in.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void | Promise<void>): void {
    // intentionally empty
  }
}
