import { connect, type Socket } from 'net';
import { z } from 'zod';
import { ok, err, ResultAsync, type Result } from 'neverthrow';
import { LineDecoder } from '../infrastructure/rpc/line-decoder.js';
import type { WireResponse } from '../infrastructure/rpc/protocol.js';
import type { RequestParams } from '../bridge/handler.js';

export interface BridgeClientOptions {
  readonly host: string;
  readonly port: number;
  /** Per-request deadline. Defaults to 35s, a little over the server's default call timeout. */
  readonly timeoutMs?: number;
}

export type ClientError =
  | Readonly<{ _tag: 'ConnectFailed'; message: string; cause: unknown }>
  | Readonly<{ _tag: 'RemoteError'; code: number; message: string; id: unknown }>
  | Readonly<{ _tag: 'ResponseTimeout'; timeoutMs: number; message: string }>
  | Readonly<{ _tag: 'ConnectionClosed'; message: string }>
  | Readonly<{ _tag: 'BadResponse'; message: string }>;

const DEFAULT_TIMEOUT_MS = 35_000;
const MAX_RESPONSE_BYTES = 64 * 1024 * 1024;

const ResponseSchema = z.union([
  z.object({ error: z.string(), code: z.number().int(), id: z.unknown() }),
  z.object({ result: z.unknown(), id: z.unknown() }).refine((value) => 'result' in value, 'missing result'),
]);

type Waiter = (outcome: Result<WireResponse, ClientError>) => void;

/**
 * Line-oriented client for the bridge.
 *
 * The server answers each connection strictly in request order, so responses
 * are matched to waiters first-in first-out. A waiter that times out stays in
 * the queue to absorb its late response.
 */
export class BridgeClient {
  private readonly waiters: Waiter[] = [];
  private readonly decoder = new LineDecoder(MAX_RESPONSE_BYTES);
  private nextId = 1;
  private closed = false;

  private constructor(
    private readonly socket: Socket,
    private readonly timeoutMs: number
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      for (const frame of this.decoder.push(chunk)) {
        this.deliver(
          frame.kind === 'line' ? parseResponse(frame.text) : err({ _tag: 'BadResponse', message: 'Response too large' })
        );
      }
    });
    socket.on('close', () => this.failAll('Connection closed by server'));
    socket.on('error', () => this.failAll('Connection error'));
  }

  static connect(options: BridgeClientOptions): Promise<Result<BridgeClient, ClientError>> {
    return new Promise((resolve) => {
      const socket = connect({ host: options.host, port: options.port });
      const onError = (cause: Error) => {
        resolve(
          err({
            _tag: 'ConnectFailed',
            message: `Cannot connect to ${options.host}:${options.port}: ${cause.message}`,
            cause,
          })
        );
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(ok(new BridgeClient(socket, options.timeoutMs ?? DEFAULT_TIMEOUT_MS)));
      });
    });
  }

  /** Send one request and resolve with its result; error responses become `RemoteError`. */
  call(method: string, params: RequestParams = {}): ResultAsync<unknown, ClientError> {
    const id = this.nextId;
    this.nextId += 1;
    const line = JSON.stringify({ method, params, id });

    return new ResultAsync(this.send(line)).andThen((response): Result<unknown, ClientError> => {
      if ('error' in response) {
        return err({ _tag: 'RemoteError', code: response.code, message: response.error, id: response.id });
      }
      if (response.id !== id) {
        return err({ _tag: 'BadResponse', message: `Expected response for id ${id}, got ${JSON.stringify(response.id)}` });
      }
      return ok(response.result);
    });
  }

  /**
   * Send one line exactly as given (a newline is appended) and resolve with
   * the raw response. The line must be non-blank: the server does not answer
   * blank lines.
   */
  sendRaw(line: string): Promise<Result<WireResponse, ClientError>> {
    const body = line.endsWith('\n') ? line.slice(0, -1) : line;
    if (body.trim() === '' || body.includes('\n')) {
      return Promise.resolve(err({ _tag: 'BadResponse', message: 'sendRaw takes exactly one non-blank line' }));
    }
    return this.send(body);
  }

  close(): Promise<void> {
    if (this.closed || this.socket.destroyed) {
      this.closed = true;
      return Promise.resolve();
    }
    this.closed = true;
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end();
    });
  }

  private send(line: string): Promise<Result<WireResponse, ClientError>> {
    if (this.closed || this.socket.destroyed) {
      return Promise.resolve(err({ _tag: 'ConnectionClosed', message: 'Client is closed' }));
    }

    return new Promise((resolve) => {
      let settled = false;
      const settle: Waiter = (outcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };
      const timer = setTimeout(() => {
        settle(
          err({
            _tag: 'ResponseTimeout',
            timeoutMs: this.timeoutMs,
            message: `No response within ${this.timeoutMs}ms`,
          })
        );
      }, this.timeoutMs);

      this.waiters.push(settle);
      this.socket.write(`${line}\n`);
    });
  }

  private deliver(outcome: Result<WireResponse, ClientError>): void {
    const waiter = this.waiters.shift();
    waiter?.(outcome);
  }

  private failAll(message: string): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(err({ _tag: 'ConnectionClosed', message }));
    }
  }
}

function parseResponse(text: string): Result<WireResponse, ClientError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return err({ _tag: 'BadResponse', message: `Response is not JSON: ${text.slice(0, 200)}` });
  }
  const parsed = ResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return err({ _tag: 'BadResponse', message: `Unexpected response shape: ${text.slice(0, 200)}` });
  }
  const data = parsed.data;
  return ok('error' in data ? { error: data.error, code: data.code, id: data.id } : { result: data.result, id: data.id });
}
