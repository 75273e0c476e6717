/**
 * Call Command
 *
 * Sends one request to a running add-in and prints the result.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { RequestParams } from '../../bridge/handler.js';
import { clientFailure, withConnection, type Connect } from './connection.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CallCommandDeps {
  readonly connect: Connect;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the call command.
 */
export async function executeCallCommand(
  method: string,
  paramsJson: string | undefined,
  deps: CallCommandDeps
): Promise<CliResult> {
  const params = parseParams(paramsJson);
  if (params.kind === 'invalid') {
    return misuse(params.message, ['Pass params as a JSON object, e.g. \'{"x": 1}\'']);
  }

  return withConnection(deps.connect, async (connection) => {
    const outcome = await connection.call(method, params.value);
    return outcome.match(
      (result) =>
        success({
          message: `${method} succeeded`,
          block: JSON.stringify(result, null, 2),
        }),
      (error) => clientFailure(error)
    );
  });
}

type ParsedParams =
  | { readonly kind: 'ok'; readonly value: RequestParams }
  | { readonly kind: 'invalid'; readonly message: string };

function parseParams(raw: string | undefined): ParsedParams {
  if (raw === undefined || raw.trim() === '') return { kind: 'ok', value: {} };

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return { kind: 'invalid', message: `Params are not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (!isPlainObject(value)) {
    return { kind: 'invalid', message: 'Params must be a JSON object' };
  }
  return { kind: 'ok', value };
}

function isPlainObject(value: unknown): value is RequestParams {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
