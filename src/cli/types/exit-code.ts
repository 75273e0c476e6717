import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands, following Unix conventions:
 * 0 success, 1 the command ran and failed (error response, no server),
 * 2 the command was used wrongly (bad params JSON, bad flag).
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'general_error' }
  | { kind: 'misuse' };

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
    default:
      return assertNever(exitCode);
  }
}
