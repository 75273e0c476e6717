/**
 * CLI Result Interpreter
 *
 * The only place a CliResult turns into output and an exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export interface InterpretOptions {
  /** One-shot commands exit on success; serve keeps running. */
  readonly exitOnSuccess?: boolean;
}

export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  options: InterpretOptions = {}
): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      if (options.exitOnSuccess) terminator.terminate({ kind: 'success' });
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}
