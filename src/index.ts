// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export { DI } from './di/tokens.js';

// Add-in entry points
export { createAddin, type Addin, type AddinDeps } from './addin/addin.js';
export type { HandlerModule } from './addin/handler-module.js';
export { systemModule } from './addin/system-module.js';

// Bridge
export { HandlerError, type Handler, type RequestParams } from './bridge/handler.js';
export { HandlerRegistry } from './bridge/handler-registry.js';
export { PendingCall, PendingCallTable, type CallOutcome } from './bridge/pending-call-table.js';
export { PendingCallSweeper } from './bridge/pending-call-sweeper.js';
export { MainThreadDispatcher, type DispatcherOptions, type MainThreadProbe } from './bridge/dispatcher.js';
export type { CallId, DispatchError } from './bridge/dispatch-error.js';

// Host
export { ThreadContext, type ThreadTag, type WorkerScope } from './host/thread-context.js';
export type {
  HostApplication,
  HostCustomEvent,
  HostCustomEventArgs,
  HostCustomEventListener,
  HostEventError,
} from './host/ports/host-application.port.js';
export { InProcessHost } from './host/adapters/in-process-host.js';

// Server and client
export { createBridgeServer, type BridgeServer, type BridgeServerDeps } from './infrastructure/rpc/server.js';
export type { ListeningAddress } from './infrastructure/rpc/acceptor.js';
export { RpcErrorCode, type WireRequest, type WireResponse } from './infrastructure/rpc/protocol.js';
export { BridgeClient, type BridgeClientOptions, type ClientError } from './client/bridge-client.js';

// Config and errors
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export {
  Err,
  formatAppError,
  describeCause,
  type AppError,
  type ConfigInvalidError,
  type StartupFailedError,
  type StartupPhase,
} from './errors/index.js';
