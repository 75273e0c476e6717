import { ok, err, type Result } from 'neverthrow';
import type { Clock } from '../runtime/ports/clock.js';
import type { RequestParams } from './handler.js';
import { DispatchErr, type CallFailure, type CallId, type OverloadedError } from './dispatch-error.js';

export type CallOutcome = Result<unknown, CallFailure>;

class Deferred<T> {
  resolve: (value: T) => void = () => undefined;
  readonly promise: Promise<T>;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolve = resolve;
    });
  }
}

/**
 * One call handed from a connection worker to the main thread.
 *
 * The outcome is written once, by the main-thread side, and only then is the
 * call marked completed and `settled` resolved. Anyone who sees
 * `completed === true` (or whose `settled` resolved) sees the outcome.
 */
export class PendingCall {
  private _outcome: CallOutcome | undefined;
  private _completed = false;
  private readonly done = new Deferred<CallOutcome>();

  constructor(
    readonly id: CallId,
    readonly method: string,
    readonly params: RequestParams,
    readonly createdAtMs: number
  ) {}

  get completed(): boolean {
    return this._completed;
  }

  get outcome(): CallOutcome | undefined {
    return this._outcome;
  }

  /** Resolves with the outcome when the main thread completes the call. Never rejects. */
  get settled(): Promise<CallOutcome> {
    return this.done.promise;
  }

  /** False if the call was already completed; the first outcome stands. */
  complete(outcome: CallOutcome): boolean {
    if (this._completed) return false;
    this._outcome = outcome;
    this._completed = true;
    this.done.resolve(outcome);
    return true;
  }
}

export interface PendingCallTableOptions {
  readonly maxPendingCalls: number;
}

/**
 * The only state shared between connection workers and the main thread.
 *
 * Lifecycle of an entry:
 * - `open` by the dispatching worker, right before it signals the main thread
 * - `complete` by the main-thread callback (a no-op if the entry is gone)
 * - `take` by the same worker after `settled`, or `abandon` on timeout
 * - `evictStale` catches anything left behind past its deadline
 *
 * Ids come from a counter that only goes up, so an id is never reused while
 * the process lives.
 */
export class PendingCallTable {
  private readonly calls = new Map<CallId, PendingCall>();
  private nextId = 1;

  constructor(
    private readonly options: PendingCallTableOptions,
    private readonly clock: Clock
  ) {}

  open(method: string, params: RequestParams): Result<PendingCall, OverloadedError> {
    if (this.calls.size >= this.options.maxPendingCalls) {
      return err(DispatchErr.overloaded(method, this.options.maxPendingCalls));
    }
    const id = this.allocateId();
    const call = new PendingCall(id, method, params, this.clock.nowMs());
    this.calls.set(id, call);
    return ok(call);
  }

  get(id: CallId): PendingCall | undefined {
    return this.calls.get(id);
  }

  complete(id: CallId, outcome: CallOutcome): boolean {
    const call = this.calls.get(id);
    return call ? call.complete(outcome) : false;
  }

  take(id: CallId): PendingCall | undefined {
    const call = this.calls.get(id);
    this.calls.delete(id);
    return call;
  }

  abandon(id: CallId): boolean {
    return this.calls.delete(id);
  }

  /** Drops entries older than `maxAgeMs`; returns the ids it removed. */
  evictStale(maxAgeMs: number): readonly CallId[] {
    const cutoff = this.clock.nowMs() - maxAgeMs;
    const evicted: CallId[] = [];
    for (const [id, call] of this.calls) {
      if (call.createdAtMs < cutoff) {
        this.calls.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  get size(): number {
    return this.calls.size;
  }

  private allocateId(): CallId {
    const id = this.nextId as CallId;
    this.nextId += 1;
    return id;
  }
}

const CALL_ID_PATTERN = /^[1-9]\d*$/;

/** Parse a call id received as text (the custom-event payload carries strings). */
export function parseCallId(raw: string): CallId | null {
  if (!CALL_ID_PATTERN.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? (value as CallId) : null;
}
