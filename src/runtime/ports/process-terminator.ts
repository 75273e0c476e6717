/**
 * Port for ending the current process.
 * Composition roots only: the bridge itself never decides to exit.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
