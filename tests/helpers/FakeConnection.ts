import { ok, err, ResultAsync, type Result } from 'neverthrow';
import type { BridgeConnection, Connect } from '../../src/cli/commands/connection.js';
import type { ClientError } from '../../src/client/bridge-client.js';
import type { RequestParams } from '../../src/bridge/handler.js';

type Reply = Result<unknown, ClientError>;

/**
 * Scripted stand-in for a connection to a running add-in.
 * Each method answers with the reply queued for it, in order.
 */
export class FakeConnection implements BridgeConnection {
  readonly calls: Array<{ method: string; params: RequestParams | undefined }> = [];
  closed = false;
  private readonly replies = new Map<string, Reply[]>();

  reply(method: string, outcome: Reply): this {
    const queued = this.replies.get(method) ?? [];
    queued.push(outcome);
    this.replies.set(method, queued);
    return this;
  }

  call(method: string, params?: RequestParams): ResultAsync<unknown, ClientError> {
    this.calls.push({ method, params });
    const next: Reply = this.replies.get(method)?.shift() ?? err({
      _tag: 'ConnectionClosed',
      message: `No scripted reply for ${method}`,
    });
    return new ResultAsync(Promise.resolve(next));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get connect(): Connect {
    return async () => ok(this);
  }
}
