import { describe, it, expect, beforeEach } from 'vitest';
import { invokeHandler } from '../../../src/bridge/invoke-handler.js';
import { HandlerError } from '../../../src/bridge/handler.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('invokeHandler', () => {
  let log: FakeLogger;

  beforeEach(() => {
    log = new FakeLogger();
  });

  it('returns a synchronous result', async () => {
    const result = await invokeHandler('add', (p) => Number(p['a']) + Number(p['b']), { a: 2, b: 3 }, log.logger);
    expect(expectOk(result, 'add')).toBe(5);
  });

  it('awaits a returned promise', async () => {
    const result = await invokeHandler('later', async () => 'done', {}, log.logger);
    expect(expectOk(result, 'later')).toBe('done');
  });

  it('runs the handler synchronously in the caller', () => {
    let ran = false;
    void invokeHandler('m', () => {
      ran = true;
    }, {}, log.logger);
    expect(ran).toBe(true);
  });

  it('turns a synchronous throw into an ExecutionError', async () => {
    const error = expectErr(
      await invokeHandler('boom', () => {
        throw new Error('exploded');
      }, {}, log.logger),
      'boom'
    );

    expect(error._tag).toBe('ExecutionError');
    expect(error.method).toBe('boom');
    expect(error.message).toBe('exploded');
    expect(log.hasEntry('error', 'Handler threw')).toBe(true);
  });

  it('turns a rejection into an ExecutionError', async () => {
    const error = expectErr(
      await invokeHandler('reject', () => Promise.reject(new Error('no luck')), {}, log.logger),
      'reject'
    );
    expect(error.message).toBe('no luck');
  });

  it('logs a HandlerError as a warning with its details', async () => {
    const error = expectErr(
      await invokeHandler('sketch.create', () => {
        throw new HandlerError('plane not found', { plane: 'xz' });
      }, {}, log.logger),
      'handler error'
    );

    expect(error.message).toBe('plane not found');
    const warning = log.getEntries('warn')[0];
    expect(warning?.msg).toBe('Handler rejected call: plane not found');
    expect(warning?.fields['details']).toEqual({ plane: 'xz' });
    expect(log.getEntries('error')).toEqual([]);
  });

  it('describes thrown non-errors', async () => {
    const error = expectErr(
      await invokeHandler('odd', () => {
        throw 'just a string';
      }, {}, log.logger),
      'string throw'
    );
    expect(error.message).toBe('just a string');
  });
});
