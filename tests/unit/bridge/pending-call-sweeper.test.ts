import { describe, it, expect, afterEach } from 'vitest';
import { PendingCallTable } from '../../../src/bridge/pending-call-table.js';
import { PendingCallSweeper } from '../../../src/bridge/pending-call-sweeper.js';
import { FakeClock } from '../../helpers/FakeClock.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';

describe('PendingCallSweeper', () => {
  const clock = new FakeClock();
  const table = new PendingCallTable({ maxPendingCalls: 10 }, clock);
  const log = new FakeLogger();
  const sweeper = new PendingCallSweeper(table, { intervalMs: 1_000, maxAgeMs: 100 }, log.logger);

  afterEach(() => {
    sweeper.stop();
    log.clear();
  });

  it('evicts orphaned entries past their deadline and logs them', () => {
    table.open('orphan', {});
    clock.advance(150);

    expect(sweeper.sweep()).toBe(1);
    expect(table.size).toBe(0);
    expect(log.hasEntry('warn', 'Evicted stale pending calls')).toBe(true);
  });

  it('leaves young entries alone and stays quiet', () => {
    table.open('young', {});
    clock.advance(50);

    expect(sweeper.sweep()).toBe(0);
    expect(table.size).toBe(1);
    expect(log.entries).toEqual([]);
  });

  it('starts and stops idempotently', () => {
    expect(sweeper.isRunning).toBe(false);
    sweeper.start();
    sweeper.start();
    expect(sweeper.isRunning).toBe(true);
    sweeper.stop();
    sweeper.stop();
    expect(sweeper.isRunning).toBe(false);
  });
});
