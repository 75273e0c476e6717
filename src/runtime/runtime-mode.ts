/**
 * How the current process was launched.
 * Injected through DI so services never sniff env vars themselves.
 */
export type RuntimeMode =
  | { kind: 'addin' }
  | { kind: 'cli' }
  | { kind: 'test' };
