import { ok, err, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { StartupFailedError } from '../errors/app-error.js';
import { formatAppError } from '../errors/formatter.js';
import type { HandlerRegistry } from '../bridge/handler-registry.js';
import type { BridgeServer } from '../infrastructure/rpc/server.js';
import type { ListeningAddress } from '../infrastructure/rpc/acceptor.js';
import type { HandlerModule } from './handler-module.js';

export interface AddinDeps {
  readonly registry: HandlerRegistry;
  readonly server: BridgeServer;
  readonly modules: readonly HandlerModule[];
  readonly logger: Logger;
}

/**
 * The two entry points a host calls on an add-in.
 *
 * Both are called on the host's main thread and neither throws: a failure is
 * logged and returned, because an exception would surface in the host's UI.
 */
export interface Addin {
  run(): Promise<Result<ListeningAddress, StartupFailedError>>;
  stop(): Promise<void>;
}

export function createAddin(deps: AddinDeps): Addin {
  const { registry, server, modules, logger } = deps;
  let registered = false;

  const registerModules = (): Result<void, StartupFailedError> => {
    if (registered) return ok(undefined);
    for (const module of modules) {
      try {
        module.register(registry);
      } catch (cause) {
        return err(Err.startupFailed('register_handlers', `Handler module "${module.name}" failed to register`, cause));
      }
    }
    registered = true;
    logger.info({ modules: modules.map((m) => m.name), methods: registry.methods() }, 'Registered handlers');
    return ok(undefined);
  };

  return {
    run: async () => {
      const prepared = registerModules();
      if (prepared.isErr()) {
        logger.error({ phase: prepared.error.phase }, formatAppError(prepared.error));
        return err(prepared.error);
      }

      const started = await server.start();
      if (started.isErr()) {
        logger.error({ phase: started.error.phase }, formatAppError(started.error));
        return started;
      }

      logger.info({ host: started.value.host, port: started.value.port }, 'Add-in running');
      return started;
    },

    stop: async () => {
      try {
        await server.stop();
        logger.info('Add-in stopped');
      } catch (error) {
        logger.error({ err: error }, 'Add-in failed to stop cleanly');
      }
    },
  };
}
