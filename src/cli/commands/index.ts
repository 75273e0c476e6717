/**
 * CLI Commands - Public API
 */

export { executeServeCommand, type ServeCommandDeps } from './serve.js';
export { executeCallCommand, type CallCommandDeps } from './call.js';
export { executeMethodsCommand, type MethodsCommandDeps } from './methods.js';
export { executePingCommand, type PingCommandDeps } from './ping.js';
export { withConnection, clientFailure, type BridgeConnection, type Connect } from './connection.js';
