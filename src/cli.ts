#!/usr/bin/env node
/**
 * cadlink CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import { ok, err, type Result } from 'neverthrow';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ShutdownEvent, ShutdownEvents } from './runtime/ports/shutdown-events.js';
import type { ThreadContext } from './host/thread-context.js';
import type { HandlerRegistry } from './bridge/handler-registry.js';
import type { Addin } from './addin/addin.js';
import {
  loadConfig,
  parseHostFlag,
  parsePortFlag,
  withListenAddress,
  type ListenHost,
  type ListenPort,
  type ValidatedConfig,
} from './config/app-config.js';
import type { ConfigInvalidError } from './errors/app-error.js';
import { Err } from './errors/factories.js';
import { formatAppError } from './errors/formatter.js';
import { createBootstrapLogger } from './core/logging/index.js';
import { BridgeClient } from './client/bridge-client.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { misuse } from './cli/types/cli-result.js';
import {
  executeServeCommand,
  executeCallCommand,
  executeMethodsCommand,
  executePingCommand,
  type BridgeConnection,
  type Connect,
} from './cli/commands/index.js';

const log = createBootstrapLogger('cli');

// ═══════════════════════════════════════════════════════════════════════════
// FLAG PARSING
// ═══════════════════════════════════════════════════════════════════════════

interface AddressFlags {
  readonly host?: string;
  readonly port?: string;
}

interface ClientFlags extends AddressFlags {
  readonly timeout?: string;
}

function applyAddressFlags(config: ValidatedConfig, flags: AddressFlags): Result<ValidatedConfig, ConfigInvalidError> {
  const host: Result<ListenHost, ConfigInvalidError> =
    flags.host === undefined ? ok(config.server.host) : parseHostFlag(flags.host);
  const port: Result<ListenPort, ConfigInvalidError> =
    flags.port === undefined ? ok(config.server.port) : parsePortFlag(flags.port);
  return host.andThen((h) => port.map((p) => withListenAddress(config, h, p)));
}

function parseTimeoutFlag(raw: string | undefined, fallback: number): Result<number, ConfigInvalidError> {
  if (raw === undefined) return ok(fallback);
  const value = Number(raw);
  return Number.isInteger(value) && value > 0
    ? ok(value)
    : err(Err.configInvalid([{ path: '--timeout', message: '--timeout must be a positive integer (ms)' }]));
}

/** Connector for the client commands, pointed at the address from env and flags. */
function clientConnector(flags: ClientFlags): Result<Connect, ConfigInvalidError> {
  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  const fallbackTimeout = config.dispatch.callTimeoutMs + 5_000;

  return applyAddressFlags(config, flags).andThen((target) =>
    parseTimeoutFlag(flags.timeout, fallbackTimeout).map(
      (timeoutMs): Connect =>
        async () =>
          (await BridgeClient.connect({ host: target.server.host, port: target.server.port, timeoutMs })).map(
            (client): BridgeConnection => client
          )
    )
  );
}

async function runClientCommand(flags: ClientFlags, run: (connect: Connect) => Promise<void>): Promise<void> {
  await initializeContainer({ runtimeMode: { kind: 'cli' } });
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

  const connector = clientConnector(flags);
  if (connector.isErr()) {
    interpretCliResult(misuse(formatAppError(connector.error)), terminator);
    return;
  }
  await run(connector.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('cadlink')
  .description('Local socket bridge to a CAD host scripting API')
  .version('0.3.0');

program
  .command('serve')
  .description('Run the add-in on the in-process host until interrupted')
  .option('--host <host>', 'listen address (overrides CADLINK_HOST)')
  .option('--port <port>', 'listen port, 0 for an ephemeral one (overrides CADLINK_PORT)')
  .action(async (flags: AddressFlags) => {
    // Config goes in before initialization so the flags win over env.
    const config = loadConfig({ env: process.env }).andThen((loaded) => applyAddressFlags(loaded, flags));
    if (config.isErr()) {
      await initializeContainer({ runtimeMode: { kind: 'cli' } });
      interpretCliResult(
        misuse(formatAppError(config.error)),
        container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator)
      );
      return;
    }
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config.value });

    await initializeContainer({ runtimeMode: { kind: 'cli' } });

    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    const threads = container.resolve<ThreadContext>(DI.Host.Threads);
    const registry = container.resolve<HandlerRegistry>(DI.Bridge.Registry);
    const addin = container.resolve<Addin>(DI.Addin.Entry);

    // A host calls run() on its main thread; so do we.
    const result = await executeServeCommand({
      runAddin: () => threads.runOnMainThread(() => addin.run()),
      listMethods: () => registry.methods(),
    });
    interpretCliResult(result, terminator);

    // Composition-root shutdown hook:
    // Infrastructure can request shutdown via ShutdownEvents, but only the entrypoint terminates the process.
    const shutdownEvents = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);
    const processSignals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);

    processSignals.on('SIGINT', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGINT' }));
    processSignals.on('SIGTERM', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' }));
    processSignals.on('SIGHUP', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGHUP' }));

    let shutdownStarted = false;
    shutdownEvents.onShutdown((event: ShutdownEvent) => {
      if (shutdownStarted) return;
      shutdownStarted = true;

      void (async () => {
        log.info({ reason: event.kind === 'shutdown_requested' ? event.signal : event.kind }, 'Shutting down');
        await threads.runOnMainThread(() => addin.stop());
        terminator.terminate({ kind: 'success' });
      })();
    });
  });

program
  .command('call <method> [params]')
  .description('Send one request to a running add-in and print the result')
  .option('--host <host>', 'server address (default CADLINK_HOST)')
  .option('--port <port>', 'server port (default CADLINK_PORT)')
  .option('--timeout <ms>', 'how long to wait for the response')
  .action(async (method: string, params: string | undefined, flags: ClientFlags) => {
    await runClientCommand(flags, async (connect) => {
      const result = await executeCallCommand(method, params, { connect });
      interpretCliResult(result, container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator), {
        exitOnSuccess: true,
      });
    });
  });

program
  .command('methods')
  .description('List the methods a running add-in exposes')
  .option('--host <host>', 'server address (default CADLINK_HOST)')
  .option('--port <port>', 'server port (default CADLINK_PORT)')
  .option('--timeout <ms>', 'how long to wait for the response')
  .action(async (flags: ClientFlags) => {
    await runClientCommand(flags, async (connect) => {
      const result = await executeMethodsCommand({ connect });
      interpretCliResult(result, container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator), {
        exitOnSuccess: true,
      });
    });
  });

program
  .command('ping')
  .description('Round-trip system.ping through the host main thread')
  .option('--host <host>', 'server address (default CADLINK_HOST)')
  .option('--port <port>', 'server port (default CADLINK_PORT)')
  .option('--timeout <ms>', 'how long to wait for the response')
  .action(async (flags: ClientFlags) => {
    await runClientCommand(flags, async (connect) => {
      const result = await executePingCommand({ connect, nowMs: () => Date.now() });
      interpretCliResult(result, container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator), {
        exitOnSuccess: true,
      });
    });
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  log.fatal({ err: error }, 'cadlink failed');
  process.exitCode = 1;
});
