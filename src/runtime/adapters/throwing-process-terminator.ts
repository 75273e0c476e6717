import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: turns an attempted exit into an exception the test can see,
 * instead of killing the vitest worker.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind}) called`);
  }
}
