/**
 * Serve Command
 *
 * Runs the add-in on the in-process host. Long-running: the composition root
 * keeps the process alive until a shutdown signal arrives.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { StartupFailedError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { ListeningAddress } from '../../infrastructure/rpc/acceptor.js';

export interface ServeCommandDeps {
  readonly runAddin: () => Promise<Result<ListeningAddress, StartupFailedError>>;
  readonly listMethods: () => readonly string[];
}

export async function executeServeCommand(deps: ServeCommandDeps): Promise<CliResult> {
  const started = await deps.runAddin();
  if (started.isErr()) {
    const suggestions =
      started.error.phase === 'listen' ? ['Pick another port with --port, or stop whatever holds this one'] : undefined;
    return failure(formatAppError(started.error), { suggestions });
  }

  const { host, port } = started.value;
  return success({
    message: `Bridge listening on ${host}:${port}`,
    details: deps.listMethods(),
    warnings: isLoopback(host)
      ? undefined
      : [`${host} is reachable from other machines; the bridge has no authentication`],
  });
}

function isLoopback(host: string): boolean {
  return host === 'localhost' || host === '::1' || host.startsWith('127.');
}
