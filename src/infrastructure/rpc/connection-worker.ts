import type { Socket } from 'net';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { RequestParams } from '../../bridge/handler.js';
import type { DispatchError } from '../../bridge/dispatch-error.js';
import type { WorkerScope } from '../../host/thread-context.js';
import { LineDecoder, type Frame } from './line-decoder.js';
import {
  decodeRequest,
  dispatchFailure,
  encodeResponse,
  protocolFailure,
  requestTooLarge,
  success,
  type WireResponse,
} from './protocol.js';

export type RequestDispatcher = (method: string, params: RequestParams) => ResultAsync<unknown, DispatchError>;

export interface ConnectionWorkerOptions {
  readonly maxMessageBytes: number;
}

/**
 * Serves one client socket: frame, decode, dispatch, encode, write.
 *
 * Requests are answered strictly in order. The socket is paused while a
 * request is in flight, so a fast client cannot queue unbounded work. Nothing
 * a single request does ends the connection; only the peer closing it or a
 * socket error does.
 */
export class ConnectionWorker {
  private readonly decoder: LineDecoder;
  private readonly queue: Frame[] = [];
  private draining = false;
  private peerEnded = false;

  constructor(
    readonly id: string,
    private readonly socket: Socket,
    private readonly dispatch: RequestDispatcher,
    private readonly scope: WorkerScope,
    private readonly options: ConnectionWorkerOptions,
    private readonly logger: Logger
  ) {
    this.decoder = new LineDecoder(options.maxMessageBytes);
  }

  start(): void {
    this.socket.setEncoding('utf8');
    this.socket.on('data', (chunk: string) => this.enqueue(this.decoder.push(chunk)));
    this.socket.on('end', () => {
      this.peerEnded = true;
      this.enqueue(this.decoder.flush());
    });
    this.socket.on('error', (error) => {
      this.logger.warn({ err: error, connection: this.id }, 'Connection fault');
      this.socket.destroy();
    });
    this.socket.on('close', () => {
      this.queue.length = 0;
      this.logger.debug({ connection: this.id }, 'Connection closed');
    });
  }

  private enqueue(frames: readonly Frame[]): void {
    this.queue.push(...frames);
    this.drain().catch((error: unknown) => {
      this.logger.error({ err: error, connection: this.id }, 'Connection worker failed');
      this.socket.destroy();
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    this.socket.pause();

    try {
      let frame: Frame | undefined;
      while ((frame = this.queue.shift()) !== undefined) {
        const response = await this.respond(frame);
        if (this.socket.destroyed) return;
        await this.write(encodeResponse(response));
      }
    } finally {
      this.draining = false;
    }

    if (this.socket.destroyed) return;
    if (this.peerEnded) {
      this.socket.end();
      return;
    }
    this.socket.resume();
  }

  private async respond(frame: Frame): Promise<WireResponse> {
    if (frame.kind === 'oversize') {
      this.logger.warn({ connection: this.id, limit: this.options.maxMessageBytes }, 'Request too large');
      return requestTooLarge(this.options.maxMessageBytes);
    }

    const decoded = decodeRequest(frame.text);
    if (decoded.isErr()) {
      this.logger.debug({ connection: this.id, reason: decoded.error.message }, 'Rejected request line');
      return protocolFailure(decoded.error);
    }

    const request = decoded.value;
    this.logger.debug({ connection: this.id, method: request.method, id: request.id }, 'Request received');

    const outcome = await this.scope.runOnWorker(this.id, () => this.dispatch(request.method, request.params));
    return outcome.match(
      (result) => success(result, request.id),
      (error) => dispatchFailure(error, request.id)
    );
  }

  private write(line: string): Promise<void> {
    return new Promise((resolve) => {
      if (!this.socket.writable) {
        resolve();
        return;
      }
      // Write errors also surface as 'error' on the socket.
      this.socket.write(`${line}\n`, () => resolve());
    });
  }
}
