import { err, type Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { StartupFailedError } from '../../errors/app-error.js';
import type { WorkerScope } from '../../host/thread-context.js';
import type { HandlerRegistry } from '../../bridge/handler-registry.js';
import type { MainThreadDispatcher } from '../../bridge/dispatcher.js';
import type { PendingCallSweeper } from '../../bridge/pending-call-sweeper.js';
import { ConnectionAcceptor, type ListeningAddress } from './acceptor.js';

export interface BridgeServer {
  /** Resolves once listening. Calling it while running returns the current address. */
  start(): Promise<Result<ListeningAddress, StartupFailedError>>;
  /** Safe when already stopped or never started. Waits out a pending start, then tears it down. */
  stop(): Promise<void>;
  address(): ListeningAddress | null;
  isRunning(): boolean;
}

export interface BridgeServerDeps {
  readonly config: ValidatedConfig;
  readonly registry: HandlerRegistry;
  readonly dispatcher: MainThreadDispatcher;
  readonly sweeper: PendingCallSweeper;
  readonly scope: WorkerScope;
  readonly logger: Logger;
}

export function createBridgeServer(deps: BridgeServerDeps): BridgeServer {
  const { config, registry, dispatcher, sweeper, scope, logger } = deps;

  const acceptor = new ConnectionAcceptor(
    (method, params) => dispatcher.dispatch(method, params),
    scope,
    {
      maxConnections: config.server.maxConnections,
      maxMessageBytes: config.server.maxMessageBytes,
    },
    logger
  );

  let starting: Promise<Result<ListeningAddress, StartupFailedError>> | null = null;

  const startOnce = async (): Promise<Result<ListeningAddress, StartupFailedError>> => {
    registry.freeze();

    const attached = dispatcher.attach();
    if (attached.isErr()) {
      logger.error({ phase: attached.error.phase, err: attached.error.cause }, attached.error.message);
      return err(attached.error);
    }

    const { host, port } = config.server;
    logger.info({ host, port, methods: registry.size }, 'Starting bridge server');

    const listening = await acceptor.start(host, port);
    if (listening.isErr()) {
      dispatcher.detach();
      logger.error({ host, port, err: listening.error.cause }, listening.error.message);
      return listening;
    }

    sweeper.start();
    logger.info({ host: listening.value.host, port: listening.value.port }, 'Bridge server listening');
    return listening;
  };

  return {
    start: () => {
      if (starting) return starting;
      starting = startOnce().finally(() => {
        starting = null;
      });
      return starting;
    },

    stop: async () => {
      // A start still in flight would otherwise bind after this teardown.
      if (starting) await starting;
      if (!acceptor.isListening && !dispatcher.isAttached && !sweeper.isRunning) {
        logger.debug('Stop requested, but the bridge server is not running');
        return;
      }
      acceptor.stop();
      sweeper.stop();
      dispatcher.detach();
      logger.info('Bridge server stopped');
    },

    address: () => acceptor.address,

    isRunning: () => acceptor.isListening,
  };
}
