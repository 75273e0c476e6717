import { describe, it, expect, beforeEach } from 'vitest';
import { ThreadContext } from '../../../src/host/thread-context.js';
import { InProcessHost } from '../../../src/host/adapters/in-process-host.js';
import type { HostCustomEventArgs } from '../../../src/host/ports/host-application.port.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('InProcessHost', () => {
  let threads: ThreadContext;
  let log: FakeLogger;
  let host: InProcessHost;

  beforeEach(() => {
    threads = new ThreadContext();
    log = new FakeLogger();
    host = new InProcessHost(threads, log.logger);
  });

  it('refuses to register the same event twice', () => {
    expectOk(host.registerCustomEvent('evt'), 'first');
    const error = expectErr(host.registerCustomEvent('evt'), 'second');
    expect(error).toEqual({
      code: 'HOST_EVENT_ALREADY_REGISTERED',
      eventId: 'evt',
      message: 'Custom event "evt" is already registered',
    });
  });

  it('returns false when firing an unregistered event', () => {
    expect(host.fireCustomEvent('missing', 'x')).toBe(false);
    expect(host.queuedEvents).toBe(0);
  });

  it('delivers fired events later, on the main thread', async () => {
    const event = expectOk(host.registerCustomEvent('evt'), 'register');
    const seen: Array<{ args: HostCustomEventArgs; main: boolean }> = [];
    event.add((args) => seen.push({ args, main: threads.isOnMainThread() }));

    expect(host.fireCustomEvent('evt', 'payload')).toBe(true);
    expect(seen).toEqual([]);

    await nextTurn();

    expect(seen).toEqual([{ args: { eventId: 'evt', additionalInfo: 'payload' }, main: true }]);
  });

  it('delivers one queued event per turn, in order', async () => {
    const event = expectOk(host.registerCustomEvent('evt'), 'register');
    const seen: string[] = [];
    event.add((args) => seen.push(args.additionalInfo));

    host.fireCustomEvent('evt', 'a');
    host.fireCustomEvent('evt', 'b');
    expect(host.queuedEvents).toBe(2);

    await nextTurn();
    expect(seen).toEqual(['a']);
    await nextTurn();
    expect(seen).toEqual(['a', 'b']);
  });

  it('keeps delivering after a listener throws', async () => {
    const event = expectOk(host.registerCustomEvent('evt'), 'register');
    const seen: string[] = [];
    event.add(() => {
      throw new Error('listener bug');
    });
    event.add((args) => seen.push(args.additionalInfo));

    host.fireCustomEvent('evt', 'a');
    await nextTurn();

    expect(seen).toEqual(['a']);
    expect(log.hasEntry('error', 'Custom event listener threw')).toBe(true);
  });

  it('drops an event whose registration went away before delivery', async () => {
    const event = expectOk(host.registerCustomEvent('evt'), 'register');
    const seen: string[] = [];
    event.add((args) => seen.push(args.additionalInfo));

    host.fireCustomEvent('evt', 'a');
    host.unregisterCustomEvent('evt');
    await nextTurn();

    expect(seen).toEqual([]);
    expect(log.hasEntry('debug', 'Dropped event for unregistered custom event')).toBe(true);
  });

  it('adds a listener only once', () => {
    const event = expectOk(host.registerCustomEvent('evt'), 'register');
    const listener = () => undefined;
    expect(event.add(listener)).toBe(true);
    expect(event.add(listener)).toBe(false);
    expect(event.remove(listener)).toBe(true);
    expect(event.remove(listener)).toBe(false);
  });
});
