import { describe, it, expect } from 'vitest';
import {
  loadConfig,
  createValidatedConfig,
  parseHostFlag,
  parsePortFlag,
  withListenAddress,
} from '../../../src/config/app-config.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'empty env');

    expect(config.server).toEqual({
      host: 'localhost',
      port: 8765,
      maxConnections: 16,
      maxMessageBytes: 1048576,
    });
    expect(config.dispatch).toEqual({
      callTimeoutMs: 30000,
      sweepIntervalMs: 5000,
      maxPendingCalls: 1024,
      eventId: 'cadlink.api_call',
    });
  });

  it('reads every variable it knows', () => {
    const config = expectOk(
      loadConfig({
        env: {
          CADLINK_HOST: ' 127.0.0.1 ',
          CADLINK_PORT: '9000',
          CADLINK_CALL_TIMEOUT_MS: '1500',
          CADLINK_SWEEP_INTERVAL_MS: '250',
          CADLINK_MAX_PENDING_CALLS: '8',
          CADLINK_MAX_CONNECTIONS: '2',
          CADLINK_MAX_MESSAGE_BYTES: '4096',
          CADLINK_EVENT_ID: 'acme.bridge',
        },
      }),
      'full env'
    );

    expect(config.server.host).toBe('127.0.0.1');
    expect(config.server.port).toBe(9000);
    expect(config.server.maxConnections).toBe(2);
    expect(config.server.maxMessageBytes).toBe(4096);
    expect(config.dispatch.callTimeoutMs).toBe(1500);
    expect(config.dispatch.sweepIntervalMs).toBe(250);
    expect(config.dispatch.maxPendingCalls).toBe(8);
    expect(config.dispatch.eventId).toBe('acme.bridge');
  });

  it('treats a blank value as unset', () => {
    const config = expectOk(loadConfig({ env: { CADLINK_PORT: '  ' } }), 'blank port');
    expect(config.server.port).toBe(8765);
  });

  it('accepts port 0 (ephemeral)', () => {
    const config = expectOk(loadConfig({ env: { CADLINK_PORT: '0' } }), 'port 0');
    expect(config.server.port).toBe(0);
  });

  it.each([
    ['abc', 'CADLINK_PORT must be a number'],
    ['1.5', 'CADLINK_PORT must be an integer'],
    ['-1', 'CADLINK_PORT must be >= 0'],
    ['70000', 'CADLINK_PORT must be <= 65535'],
  ])('rejects CADLINK_PORT=%s', (raw, message) => {
    const error = expectErr(loadConfig({ env: { CADLINK_PORT: raw } }), `port ${raw}`);

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.message).toBe('Invalid cadlink configuration');
    expect(error.issues).toEqual([{ path: 'CADLINK_PORT', message }]);
  });

  it('rejects an empty host', () => {
    const error = expectErr(loadConfig({ env: { CADLINK_HOST: '   ' } }), 'empty host');
    expect(error.issues).toEqual([{ path: 'CADLINK_HOST', message: 'CADLINK_HOST cannot be empty' }]);
  });

  it('reports every invalid variable at once', () => {
    const error = expectErr(
      loadConfig({ env: { CADLINK_CALL_TIMEOUT_MS: '0', CADLINK_MAX_CONNECTIONS: '5000' } }),
      'two invalid'
    );
    expect(error.issues.map((i) => i.path)).toEqual(['CADLINK_CALL_TIMEOUT_MS', 'CADLINK_MAX_CONNECTIONS']);
  });
});

describe('createValidatedConfig', () => {
  it('overrides only what it is given', () => {
    const config = createValidatedConfig({ server: { port: 0 }, dispatch: { callTimeoutMs: 50 } });

    expect(config.server.port).toBe(0);
    expect(config.server.host).toBe('localhost');
    expect(config.dispatch.callTimeoutMs).toBe(50);
    expect(config.dispatch.sweepIntervalMs).toBe(5000);
  });
});

describe('CLI address flags', () => {
  it('parses a port flag', () => {
    expect(expectOk(parsePortFlag('4242'), 'port flag')).toBe(4242);
  });

  it('rejects an out-of-range port flag', () => {
    const error = expectErr(parsePortFlag('-1'), 'negative port flag');
    expect(error.issues).toEqual([{ path: '(root)', message: '--port must be >= 0' }]);
  });

  it('trims the host flag and rejects a blank one', () => {
    expect(expectOk(parseHostFlag(' 0.0.0.0 '), 'host flag')).toBe('0.0.0.0');
    expect(expectErr(parseHostFlag(' '), 'blank host').issues).toEqual([
      { path: '--host', message: 'host cannot be empty' },
    ]);
  });

  it('replaces the listen address and keeps the rest', () => {
    const base = createValidatedConfig({ dispatch: { maxPendingCalls: 3 } });
    const host = expectOk(parseHostFlag('127.0.0.1'), 'host');
    const port = expectOk(parsePortFlag('0'), 'port');

    const updated = withListenAddress(base, host, port);

    expect(updated.server.host).toBe('127.0.0.1');
    expect(updated.server.port).toBe(0);
    expect(updated.dispatch.maxPendingCalls).toBe(3);
    expect(base.server.port).toBe(8765);
  });
});
