import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { Clock } from '../runtime/ports/clock.js';
import { SystemClock } from '../runtime/adapters/system-clock.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import { PinoLoggerFactory, createBootstrapLogger, type ILoggerFactory } from '../core/logging/index.js';
import { ThreadContext } from '../host/thread-context.js';
import type { HostApplication } from '../host/ports/host-application.port.js';
import { InProcessHost } from '../host/adapters/in-process-host.js';
import { HandlerRegistry } from '../bridge/handler-registry.js';
import { PendingCallTable } from '../bridge/pending-call-table.js';
import { PendingCallSweeper } from '../bridge/pending-call-sweeper.js';
import { MainThreadDispatcher } from '../bridge/dispatcher.js';
import { createBridgeServer, type BridgeServer } from '../infrastructure/rpc/server.js';
import { createAddin, type Addin } from '../addin/addin.js';
import type { HandlerModule } from '../addin/handler-module.js';
import { systemModule } from '../addin/system-module.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

const log = createBootstrapLogger('di');

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'addin' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
    case 'addin':
      // The host owns the process.
      return { kind: 'no_signal_handlers' };
    case 'cli':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions = {}): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  // Shutdown event bus is always available (even in tests) but only used when something emits.
  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  if (!container.isRegistered(DI.Runtime.Clock)) {
    container.register<Clock>(DI.Runtime.Clock, { useValue: new SystemClock() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Tests inject config explicitly before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) {
    log.fatal({ issues: configResult.error.issues }, formatAppError(configResult.error));
    return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator).terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerLogging(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

function registerHost(): void {
  container.register<ThreadContext>(DI.Host.Threads, {
    useFactory: instanceCachingFactory(() => new ThreadContext()),
  });

  // A real host adapter is registered by the embedding loader before initialization.
  if (!container.isRegistered(DI.Host.Application)) {
    container.register<HostApplication>(DI.Host.Application, {
      useFactory: instanceCachingFactory(
        (c: DependencyContainer) =>
          new InProcessHost(
            c.resolve<ThreadContext>(DI.Host.Threads),
            c.resolve<ILoggerFactory>(DI.Logging.Factory).create('host')
          )
      ),
    });
  }
}

function registerBridge(): void {
  container.register<HandlerRegistry>(DI.Bridge.Registry, {
    useFactory: instanceCachingFactory(() => new HandlerRegistry()),
  });

  container.register<PendingCallTable>(DI.Bridge.PendingCalls, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new PendingCallTable(
        { maxPendingCalls: config.dispatch.maxPendingCalls },
        c.resolve<Clock>(DI.Runtime.Clock)
      );
    }),
  });

  container.register<PendingCallSweeper>(DI.Bridge.Sweeper, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const { callTimeoutMs, sweepIntervalMs } = c.resolve<ValidatedConfig>(DI.Config.App).dispatch;
      return new PendingCallSweeper(
        c.resolve<PendingCallTable>(DI.Bridge.PendingCalls),
        { intervalMs: sweepIntervalMs, maxAgeMs: callTimeoutMs + sweepIntervalMs },
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('sweeper')
      );
    }),
  });

  container.register<MainThreadDispatcher>(DI.Bridge.Dispatcher, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const { callTimeoutMs, eventId } = c.resolve<ValidatedConfig>(DI.Config.App).dispatch;
      return new MainThreadDispatcher(
        c.resolve<HandlerRegistry>(DI.Bridge.Registry),
        c.resolve<PendingCallTable>(DI.Bridge.PendingCalls),
        c.resolve<HostApplication>(DI.Host.Application),
        c.resolve<ThreadContext>(DI.Host.Threads),
        { callTimeoutMs, eventId },
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('dispatcher')
      );
    }),
  });
}

function registerServer(): void {
  container.register<BridgeServer>(DI.Server.Bridge, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createBridgeServer({
        config: c.resolve<ValidatedConfig>(DI.Config.App),
        registry: c.resolve<HandlerRegistry>(DI.Bridge.Registry),
        dispatcher: c.resolve<MainThreadDispatcher>(DI.Bridge.Dispatcher),
        sweeper: c.resolve<PendingCallSweeper>(DI.Bridge.Sweeper),
        scope: c.resolve<ThreadContext>(DI.Host.Threads),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('server'),
      })
    ),
  });
}

function registerAddin(): void {
  // Embedders add their own modules by registering this token first.
  if (!container.isRegistered(DI.Addin.Modules)) {
    container.register<readonly HandlerModule[]>(DI.Addin.Modules, { useValue: [systemModule] });
  }

  container.register<Addin>(DI.Addin.Entry, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createAddin({
        registry: c.resolve<HandlerRegistry>(DI.Bridge.Registry),
        server: c.resolve<BridgeServer>(DI.Server.Bridge),
        modules: c.resolve<readonly HandlerModule[]>(DI.Addin.Modules),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('addin'),
      })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Concurrent calls share one initialization; calls after it has finished
 * return immediately. Tokens registered beforehand (config, host, handler
 * modules, clock, logger factory) are left as they are.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return Promise.resolve();
  if (initializationPromise) return initializationPromise;

  initializationPromise = Promise.resolve().then(() => {
    try {
      registerRuntime(options);
      registerConfig();
      registerLogging();
      registerHost();
      registerBridge();
      registerServer();
      registerAddin();
      initialized = true;
      log.debug('Container initialized');
    } catch (error) {
      // Fail fast: leave initializationPromise rejected so callers don't retry in a loop.
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`[DI] Container initialization failed: ${message}`);
    }
  });

  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
