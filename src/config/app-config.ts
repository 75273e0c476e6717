/**
 * Add-in configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface (env vars below)
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type ListenHost = Brand<string, 'ListenHost'>;
export type ListenPort = Brand<number, 'ListenPort'>;
export type TimeoutMs = Brand<number, 'TimeoutMs'>;
export type HostEventId = Brand<string, 'HostEventId'>;

export interface AppConfig {
  readonly server: {
    readonly host: ListenHost;
    readonly port: ListenPort;
    readonly maxConnections: number;
    readonly maxMessageBytes: number;
  };
  readonly dispatch: {
    readonly callTimeoutMs: TimeoutMs;
    readonly sweepIntervalMs: TimeoutMs;
    readonly maxPendingCalls: number;
    readonly eventId: HostEventId;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

function intVar(name: string, min: number, max: number, fallback: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback)
    );
}

const EnvSchema = z.object({
  CADLINK_HOST: z.string().trim().min(1, 'CADLINK_HOST cannot be empty').default('localhost'),
  CADLINK_PORT: intVar('CADLINK_PORT', 0, 65535, 8765),
  CADLINK_CALL_TIMEOUT_MS: intVar('CADLINK_CALL_TIMEOUT_MS', 1, 600_000, 30_000),
  CADLINK_SWEEP_INTERVAL_MS: intVar('CADLINK_SWEEP_INTERVAL_MS', 100, 600_000, 5_000),
  CADLINK_MAX_PENDING_CALLS: intVar('CADLINK_MAX_PENDING_CALLS', 1, 100_000, 1024),
  CADLINK_MAX_CONNECTIONS: intVar('CADLINK_MAX_CONNECTIONS', 1, 1024, 16),
  CADLINK_MAX_MESSAGE_BYTES: intVar('CADLINK_MAX_MESSAGE_BYTES', 1024, 64 * 1024 * 1024, 1024 * 1024),
  CADLINK_EVENT_ID: z.string().trim().min(1, 'CADLINK_EVENT_ID cannot be empty').default('cadlink.api_call'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(brandValidated(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * Anything not given falls back to the same defaults `loadConfig` uses.
 */
export function createValidatedConfig(overrides: ConfigOverrides = {}): ValidatedConfig {
  const defaults = buildConfig(EnvSchema.parse({}));
  const server = { ...defaults.server, ...overrides.server };
  const dispatch = { ...defaults.dispatch, ...overrides.dispatch };
  return brandValidated({
    server: {
      host: server.host as ListenHost,
      port: server.port as ListenPort,
      maxConnections: server.maxConnections,
      maxMessageBytes: server.maxMessageBytes,
    },
    dispatch: {
      callTimeoutMs: dispatch.callTimeoutMs as TimeoutMs,
      sweepIntervalMs: dispatch.sweepIntervalMs as TimeoutMs,
      maxPendingCalls: dispatch.maxPendingCalls,
      eventId: dispatch.eventId as HostEventId,
    },
  });
}

export interface ConfigOverrides {
  readonly server?: Partial<{
    readonly host: string;
    readonly port: number;
    readonly maxConnections: number;
    readonly maxMessageBytes: number;
  }>;
  readonly dispatch?: Partial<{
    readonly callTimeoutMs: number;
    readonly sweepIntervalMs: number;
    readonly maxPendingCalls: number;
    readonly eventId: string;
  }>;
}

/**
 * Copy of a validated config with the listen address replaced (CLI flags).
 * Port validity is the caller's job; the CLI parses flags through `parsePortFlag`.
 */
export function withListenAddress(config: ValidatedConfig, host: ListenHost, port: ListenPort): ValidatedConfig {
  return brandValidated({ ...config, server: { ...config.server, host, port } });
}

export function parsePortFlag(raw: string): Result<ListenPort, ConfigInvalidError> {
  const parsed = intVar('--port', 0, 65535, 8765).safeParse(raw);
  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }
  return ok(parsed.data as ListenPort);
}

export function parseHostFlag(raw: string): Result<ListenHost, ConfigInvalidError> {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return err(Err.configInvalid([{ path: '--host', message: 'host cannot be empty' }]));
  }
  return ok(trimmed as ListenHost);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    server: {
      host: env.CADLINK_HOST as ListenHost,
      port: env.CADLINK_PORT as ListenPort,
      maxConnections: env.CADLINK_MAX_CONNECTIONS,
      maxMessageBytes: env.CADLINK_MAX_MESSAGE_BYTES,
    },
    dispatch: {
      callTimeoutMs: env.CADLINK_CALL_TIMEOUT_MS as TimeoutMs,
      sweepIntervalMs: env.CADLINK_SWEEP_INTERVAL_MS as TimeoutMs,
      maxPendingCalls: env.CADLINK_MAX_PENDING_CALLS,
      eventId: env.CADLINK_EVENT_ID as HostEventId,
    },
  };
}

function brandValidated(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
