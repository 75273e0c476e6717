/**
 * Ping Command
 *
 * Round-trips system.ping through the host's main thread.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { clientFailure, withConnection, type Connect } from './connection.js';

export interface PingCommandDeps {
  readonly connect: Connect;
  readonly nowMs: () => number;
}

export async function executePingCommand(deps: PingCommandDeps): Promise<CliResult> {
  return withConnection(deps.connect, async (connection) => {
    const startedAt = deps.nowMs();
    const outcome = await connection.call('system.ping');
    if (outcome.isErr()) return clientFailure(outcome.error);

    const elapsed = deps.nowMs() - startedAt;
    const reply = outcome.value;
    if (typeof reply !== 'object' || reply === null || Reflect.get(reply, 'pong') !== true) {
      return failure('Unexpected system.ping result', { details: [JSON.stringify(reply)] });
    }
    return success({ message: `pong (${elapsed}ms)` });
  });
}
