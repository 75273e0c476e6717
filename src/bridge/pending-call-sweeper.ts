import type { Logger } from '../core/logging/index.js';
import type { PendingCallTable } from './pending-call-table.js';

export interface PendingCallSweeperOptions {
  readonly intervalMs: number;
  /** Entries older than this are orphans: their waiter has already timed out. */
  readonly maxAgeMs: number;
}

/**
 * Periodic eviction of pending calls nobody is waiting for any more.
 *
 * Waiters remove their own entry on timeout, so in normal operation this finds
 * nothing. The timer is unref'd and never keeps the process alive.
 */
export class PendingCallSweeper {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly calls: PendingCallTable,
    private readonly options: PendingCallSweeperOptions,
    private readonly logger: Logger
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  sweep(): number {
    const evicted = this.calls.evictStale(this.options.maxAgeMs);
    if (evicted.length > 0) {
      this.logger.warn({ evicted, remaining: this.calls.size }, 'Evicted stale pending calls');
    }
    return evicted.length;
  }
}
