import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HandlerError } from '../../src/bridge/handler.js';
import { createBridgeHarness, LineSocket, tryConnect, type BridgeHarness } from '../helpers/bridge-harness.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('bridge server over TCP', () => {
  let harness: BridgeHarness;
  let port: number;
  const sockets: LineSocket[] = [];

  async function open(): Promise<LineSocket> {
    const socket = await LineSocket.open(port);
    sockets.push(socket);
    return socket;
  }

  beforeEach(async () => {
    harness = createBridgeHarness({ server: { maxMessageBytes: 1024 }, dispatch: { callTimeoutMs: 300 } });
    harness.registry.register('echo', (params) => params);
    harness.registry.register('where', () => ({ main: harness.threads.isOnMainThread() }));
    harness.registry.register('fail', () => {
      throw new HandlerError('no sketch named "Sketch9"');
    });
    harness.registry.register('hang', () => new Promise<never>(() => undefined));
    harness.registry.register('bigint', () => ({ big: 10n }));
    harness.registry.register('fn', () => () => 1);
    port = expectOk(await harness.server.start(), 'start').port;
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) socket.destroy();
    await harness.server.stop();
  });

  describe('request handling', () => {
    it('echoes the result with the request id', async () => {
      const client = await open();
      client.write('{"method":"echo","params":{"x":1},"id":7}\n');
      expect(await client.nextLine()).toBe('{"result":{"x":1},"id":7}');
    });

    it('runs handlers on the main thread', async () => {
      const client = await open();
      client.write('{"method":"where","id":"w"}\n');
      expect(await client.nextJson()).toEqual({ result: { main: true }, id: 'w' });
    });

    it('answers an unknown method with -32601', async () => {
      const client = await open();
      client.write('{"method":"nope","params":{},"id":1}\n');
      expect(await client.nextLine()).toBe('{"error":"Unknown method: nope","code":-32601,"id":1}');
    });

    it('answers a handler failure with -32603 and its message', async () => {
      const client = await open();
      client.write('{"method":"fail","id":2}\n');
      expect(await client.nextJson()).toEqual({ error: 'no sketch named "Sketch9"', code: -32603, id: 2 });
    });

    it('answers a result JSON cannot hold with -32603', async () => {
      const client = await open();
      client.write('{"method":"bigint","id":3}\n');
      expect(await client.nextJson()).toEqual({
        error: 'Failed to encode result: TypeError: Do not know how to serialize a BigInt',
        code: -32603,
        id: 3,
      });
    });

    it('answers a result JSON would drop with -32603 instead of a bare id', async () => {
      const client = await open();
      client.write('{"method":"fn","id":1}\n');
      expect(await client.nextLine()).toBe(
        '{"error":"Failed to encode result: TypeError: function value has no JSON representation","code":-32603,"id":1}'
      );
    });

    it('answers -32001 when the main thread does not finish in time', async () => {
      const client = await open();
      client.write('{"method":"hang","id":4}\n');
      expect(await client.nextJson()).toEqual({
        error: 'Main thread execution timeout after 300ms (hang)',
        code: -32001,
        id: 4,
      });
      expect(harness.calls.size).toBe(0);
    });
  });

  describe('framing', () => {
    it('keeps the connection usable after a line that is not JSON', async () => {
      const client = await open();
      client.write('not json\n{"method":"echo","params":{"ok":true},"id":2}\n');
      expect(await client.nextLine()).toBe('{"error":"Invalid JSON","code":-32700,"id":null}');
      expect(await client.nextLine()).toBe('{"result":{"ok":true},"id":2}');
    });

    it('answers -32600 for a request without a method, echoing its id', async () => {
      const client = await open();
      client.write('{"params":{},"id":5}\n');
      expect(await client.nextJson()).toEqual({ error: 'Invalid request: method: Required', code: -32600, id: 5 });
    });

    it('answers several requests from one write in order', async () => {
      const client = await open();
      client.write(
        ['{"method":"echo","params":{"n":1},"id":1}', '{"method":"nope","id":2}', '{"method":"echo","params":{"n":3},"id":3}']
          .map((line) => `${line}\n`)
          .join('')
      );
      expect(await client.nextJson()).toEqual({ result: { n: 1 }, id: 1 });
      expect(await client.nextJson()).toEqual({ error: 'Unknown method: nope', code: -32601, id: 2 });
      expect(await client.nextJson()).toEqual({ result: { n: 3 }, id: 3 });
    });

    it('reassembles a request split across writes', async () => {
      const client = await open();
      client.write('{"method":"ec');
      await new Promise((resolve) => setTimeout(resolve, 20));
      client.write('ho","params":{"split":true},"id":6}\n');
      expect(await client.nextJson()).toEqual({ result: { split: true }, id: 6 });
    });

    it('does not treat braces or escaped newlines inside strings as framing', async () => {
      const client = await open();
      client.write('{"method":"echo","params":{"s":"}{\\n}"},"id":8}\n');
      expect(await client.nextJson()).toEqual({ result: { s: '}{\n}' }, id: 8 });
    });

    it('rejects an oversize request and keeps serving the connection', async () => {
      const client = await open();
      const padding = 'x'.repeat(2_000);
      client.write(`{"method":"echo","params":{"pad":"${padding}"},"id":1}\n{"method":"echo","params":{},"id":2}\n`);
      expect(await client.nextLine()).toBe('{"error":"Request too large (limit 1024 bytes)","code":-32600,"id":null}');
      expect(await client.nextJson()).toEqual({ result: {}, id: 2 });
    });

    it('answers an unterminated last request after the client half-closes', async () => {
      const client = await open();
      client.write('{"method":"echo","params":{"last":true},"id":9}');
      client.end();
      expect(await client.nextJson()).toEqual({ result: { last: true }, id: 9 });
      expect(await client.nextLine()).toBeNull();
    });
  });

  describe('concurrency', () => {
    it('serves ten connections at once', async () => {
      const clients = await Promise.all(Array.from({ length: 10 }, () => open()));
      clients.forEach((client, n) => client.write(`{"method":"echo","params":{"n":${n}},"id":${n}}\n`));

      const responses = await Promise.all(clients.map((client) => client.nextJson()));

      expect(responses).toEqual(Array.from({ length: 10 }, (_, n) => ({ result: { n }, id: n })));
    });

    it('keeps other connections moving while one waits on a slow call', async () => {
      const slow = await open();
      const fast = await open();
      slow.write('{"method":"hang","id":"slow"}\n');
      fast.write('{"method":"echo","params":{},"id":"fast"}\n');

      expect(await fast.nextJson(200)).toEqual({ result: {}, id: 'fast' });
      expect(await slow.nextJson()).toMatchObject({ code: -32001, id: 'slow' });
    });
  });

  describe('lifecycle', () => {
    it('returns the same address when started again', async () => {
      const again = expectOk(await harness.server.start(), 'second start');
      expect(again).toEqual({ host: '127.0.0.1', port });
      expect(harness.server.address()).toEqual({ host: '127.0.0.1', port });
    });

    it('refuses registrations once started', () => {
      expect(() => harness.registry.register('late', () => null)).toThrow(
        '[HandlerRegistry] Cannot register "late" after the server has started'
      );
    });

    it('stops accepting but lets open connections finish', async () => {
      const client = await open();

      await harness.server.stop();

      expect(harness.server.isRunning()).toBe(false);
      expect(harness.dispatcher.isAttached).toBe(false);
      expect((await tryConnect(port))?.code).toBe('ECONNREFUSED');

      // The event is gone, so calls needing the main thread fail fast.
      client.write('{"method":"echo","params":{},"id":1}\n');
      expect(await client.nextJson()).toEqual({
        error: 'Host did not accept main-thread signal "cadlink.api_call"',
        code: -32003,
        id: 1,
      });
    });

    it('treats a second stop as a no-op', async () => {
      await harness.server.stop();
      await harness.server.stop();

      expect(harness.logs.getLogger('server')?.hasEntry('debug', 'Stop requested, but the bridge server is not running')).toBe(
        true
      );
    });

    it('leaves nothing listening when stopped while a start is still pending', async () => {
      const racing = createBridgeHarness();

      const started = racing.server.start();
      await racing.server.stop();
      const bound = expectOk(await started, 'start raced by stop').port;

      expect(racing.server.isRunning()).toBe(false);
      expect(racing.server.address()).toBeNull();
      expect(racing.dispatcher.isAttached).toBe(false);
      expect(racing.sweeper.isRunning).toBe(false);
      expect((await tryConnect(bound))?.code).toBe('ECONNREFUSED');
    });

    it('fails with a listen error when the port is taken, and detaches', async () => {
      const second = createBridgeHarness({ server: { port } });

      const error = expectErr(await second.server.start(), 'start on a taken port');

      expect(error.phase).toBe('listen');
      expect(error.message.startsWith(`Cannot listen on 127.0.0.1:${port}: `)).toBe(true);
      expect(second.dispatcher.isAttached).toBe(false);
      expect(second.server.isRunning()).toBe(false);
    });
  });
});
