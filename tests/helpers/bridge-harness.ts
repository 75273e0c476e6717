import { connect, type Socket } from 'net';
import { ThreadContext } from '../../src/host/thread-context.js';
import { InProcessHost } from '../../src/host/adapters/in-process-host.js';
import { HandlerRegistry } from '../../src/bridge/handler-registry.js';
import { PendingCallTable } from '../../src/bridge/pending-call-table.js';
import { PendingCallSweeper } from '../../src/bridge/pending-call-sweeper.js';
import { MainThreadDispatcher } from '../../src/bridge/dispatcher.js';
import { createBridgeServer, type BridgeServer } from '../../src/infrastructure/rpc/server.js';
import { createValidatedConfig, type ConfigOverrides } from '../../src/config/app-config.js';
import { SystemClock } from '../../src/runtime/adapters/system-clock.js';
import { FakeLoggerFactory } from './FakeLoggerFactory.js';

export interface BridgeHarness {
  readonly threads: ThreadContext;
  readonly host: InProcessHost;
  readonly registry: HandlerRegistry;
  readonly calls: PendingCallTable;
  readonly dispatcher: MainThreadDispatcher;
  readonly sweeper: PendingCallSweeper;
  readonly server: BridgeServer;
  readonly logs: FakeLoggerFactory;
}

/**
 * The whole bridge wired by hand on 127.0.0.1 with an ephemeral port and the
 * in-process host. Register handlers on `registry`, then start `server`.
 */
export function createBridgeHarness(overrides: ConfigOverrides = {}): BridgeHarness {
  const config = createValidatedConfig({
    server: { host: '127.0.0.1', port: 0, ...overrides.server },
    dispatch: { ...overrides.dispatch },
  });
  const logs = new FakeLoggerFactory();
  const threads = new ThreadContext();
  const host = new InProcessHost(threads, logs.create('host'));
  const registry = new HandlerRegistry();
  const calls = new PendingCallTable({ maxPendingCalls: config.dispatch.maxPendingCalls }, new SystemClock());
  const dispatcher = new MainThreadDispatcher(
    registry,
    calls,
    host,
    threads,
    { callTimeoutMs: config.dispatch.callTimeoutMs, eventId: config.dispatch.eventId },
    logs.create('dispatcher')
  );
  const sweeper = new PendingCallSweeper(
    calls,
    {
      intervalMs: config.dispatch.sweepIntervalMs,
      maxAgeMs: config.dispatch.callTimeoutMs + config.dispatch.sweepIntervalMs,
    },
    logs.create('sweeper')
  );
  const server = createBridgeServer({
    config,
    registry,
    dispatcher,
    sweeper,
    scope: threads,
    logger: logs.create('server'),
  });
  return { threads, host, registry, calls, dispatcher, sweeper, server, logs };
}

/**
 * Raw line-oriented socket for protocol tests: write arbitrary bytes, read
 * response lines in order.
 */
export class LineSocket {
  private buffer = '';
  private readonly lines: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private ended = false;

  private constructor(readonly socket: Socket) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      this.buffer += chunk;
      let index: number;
      while ((index = this.buffer.indexOf('\n')) !== -1) {
        this.push(this.buffer.slice(0, index));
        this.buffer = this.buffer.slice(index + 1);
      }
    });
    socket.on('close', () => {
      this.ended = true;
      for (const waiter of this.waiters.splice(0)) waiter(null);
    });
  }

  static open(port: number, host = '127.0.0.1'): Promise<LineSocket> {
    return new Promise((resolve, reject) => {
      const socket = connect({ host, port });
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        resolve(new LineSocket(socket));
      });
    });
  }

  write(text: string): void {
    this.socket.write(text);
  }

  /** Next response line, or null once the server has closed the connection. */
  nextLine(timeoutMs = 5_000): Promise<string | null> {
    const ready = this.lines.shift();
    if (ready !== undefined) return Promise.resolve(ready);
    if (this.ended) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(`No line within ${timeoutMs}ms`)), timeoutMs);
      this.waiters.push((line) => {
        clearTimeout(timer);
        resolve(line);
      });
    });
  }

  async nextJson(timeoutMs?: number): Promise<unknown> {
    const line = await this.nextLine(timeoutMs);
    if (line === null) throw new Error('Connection closed before a response arrived');
    return JSON.parse(line);
  }

  /** Half-close: the server sees end-of-stream but can still answer. */
  end(): void {
    this.socket.end();
  }

  destroy(): void {
    this.socket.destroy();
  }

  private push(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(line);
    else this.lines.push(line);
  }
}

/** Resolves with the connect error, or null if the connection succeeded. */
export function tryConnect(port: number, host = '127.0.0.1'): Promise<NodeJS.ErrnoException | null> {
  return new Promise((resolve) => {
    const socket = connect({ host, port });
    socket.once('error', (error: NodeJS.ErrnoException) => resolve(error));
    socket.once('connect', () => {
      socket.destroy();
      resolve(null);
    });
  });
}
