import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node adapter for ProcessSignals.
 * Node passes the signal name / exit code to listeners; handlers here take none.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    const listener = (): void => {
      void handler();
    };
    if (signal === 'exit') {
      process.on('exit', listener);
    } else {
      process.on(signal, listener);
    }
  }
}
