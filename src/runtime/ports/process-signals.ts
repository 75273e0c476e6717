/**
 * Port for subscribing to process signals.
 * Only the standalone `serve` command installs real handlers; an add-in loaded
 * into a host application gets the no-op adapter.
 */
export type ProcessSignal = NodeJS.Signals | 'exit';

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void;
}
