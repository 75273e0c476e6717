/**
 * Whether the composition root should own process signals.
 * An add-in hosted inside another application must leave signals to its host.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
