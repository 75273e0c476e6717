/**
 * Shared plumbing for commands that talk to a running add-in.
 */

import type { ResultAsync, Result } from 'neverthrow';
import type { ClientError } from '../../client/bridge-client.js';
import type { RequestParams } from '../../bridge/handler.js';
import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface BridgeConnection {
  call(method: string, params?: RequestParams): ResultAsync<unknown, ClientError>;
  close(): Promise<void>;
}

export type Connect = () => Promise<Result<BridgeConnection, ClientError>>;

/**
 * Open a connection, run `use`, always close. Connection and call failures
 * become CLI failures.
 */
export async function withConnection(
  connect: Connect,
  use: (connection: BridgeConnection) => Promise<CliResult>
): Promise<CliResult> {
  const connected = await connect();
  if (connected.isErr()) {
    return clientFailure(connected.error);
  }

  const connection = connected.value;
  try {
    return await use(connection);
  } finally {
    await connection.close();
  }
}

export function clientFailure(error: ClientError): CliResult {
  switch (error._tag) {
    case 'ConnectFailed':
      return failure(error.message, {
        suggestions: ['Is the add-in running? Start one with "cadlink serve"'],
      });

    case 'RemoteError':
      return failure(`Error ${error.code}: ${error.message}`);

    case 'ResponseTimeout':
      return failure(error.message, {
        suggestions: ['Raise --timeout, or check whether the host is busy'],
      });

    case 'ConnectionClosed':
    case 'BadResponse':
      return failure(error.message);

    default:
      return assertNever(error);
  }
}
