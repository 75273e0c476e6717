/**
 * Methods Command
 *
 * Lists the methods a running add-in exposes.
 */

import { z } from 'zod';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { clientFailure, withConnection, type Connect } from './connection.js';

export interface MethodsCommandDeps {
  readonly connect: Connect;
}

const ListMethodsResult = z.object({ methods: z.array(z.string()) });

export async function executeMethodsCommand(deps: MethodsCommandDeps): Promise<CliResult> {
  return withConnection(deps.connect, async (connection) => {
    const outcome = await connection.call('system.list_methods');
    if (outcome.isErr()) return clientFailure(outcome.error);

    const parsed = ListMethodsResult.safeParse(outcome.value);
    if (!parsed.success) {
      return failure('Unexpected system.list_methods result', {
        details: [JSON.stringify(outcome.value)],
      });
    }

    const { methods } = parsed.data;
    if (methods.length === 0) {
      return success({ message: 'No methods registered' });
    }

    return success({
      message: `${methods.length} methods available`,
      details: methods,
    });
  });
}
