import { createServer, type Server, type Socket } from 'net';
import { ok, err, type Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { WorkerScope } from '../../host/thread-context.js';
import { Err } from '../../errors/factories.js';
import type { StartupFailedError } from '../../errors/app-error.js';
import { ConnectionWorker, type RequestDispatcher } from './connection-worker.js';

export interface ListeningAddress {
  readonly host: string;
  readonly port: number;
}

export interface AcceptorOptions {
  readonly maxConnections: number;
  readonly maxMessageBytes: number;
}

/**
 * Owns the listening socket and hands each accepted connection to its own
 * ConnectionWorker. Keeps no per-connection state besides the id counter.
 */
export class ConnectionAcceptor {
  private server: Server | null = null;
  private bound: ListeningAddress | null = null;
  private nextConnection = 1;

  constructor(
    private readonly dispatch: RequestDispatcher,
    private readonly scope: WorkerScope,
    private readonly options: AcceptorOptions,
    private readonly logger: Logger
  ) {}

  get address(): ListeningAddress | null {
    return this.bound;
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  start(host: string, port: number): Promise<Result<ListeningAddress, StartupFailedError>> {
    if (this.bound) return Promise.resolve(ok(this.bound));

    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    server.maxConnections = this.options.maxConnections;

    return new Promise((resolve) => {
      const onListenError = (error: Error) => {
        resolve(err(Err.startupFailed('listen', `Cannot listen on ${host}:${port}: ${error.message}`, error)));
      };

      server.once('error', onListenError);
      server.listen({ host, port }, () => {
        server.off('error', onListenError);
        server.on('error', (error) => this.logger.error({ err: error }, 'Listener error'));
        server.on('drop', (data) => {
          this.logger.warn({ remote: data?.remoteAddress, limit: this.options.maxConnections }, 'Connection refused: limit reached');
        });

        const info = server.address();
        const bound = { host, port: typeof info === 'object' && info !== null ? info.port : port };
        this.server = server;
        this.bound = bound;
        resolve(ok(bound));
      });
    });
  }

  /**
   * Stop accepting. Open connections keep being served until their peers
   * disconnect; this does not wait for them.
   */
  stop(): void {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.bound = null;
    server.close((error) => {
      if (error) this.logger.debug({ err: error }, 'Listener close reported an error');
      else this.logger.debug('Listener closed and all connections ended');
    });
  }

  private accept(socket: Socket): void {
    const id = `conn-${this.nextConnection}`;
    this.nextConnection += 1;
    this.logger.debug({ connection: id, remote: socket.remoteAddress, port: socket.remotePort }, 'Connection accepted');
    new ConnectionWorker(id, socket, this.dispatch, this.scope, this.options, this.logger).start();
  }
}
