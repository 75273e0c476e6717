/**
 * Dispatch failures - discriminated on `_tag`.
 *
 * These are what `MainThreadDispatcher.dispatch` can fail with. Mapping to
 * wire codes happens in the protocol layer, nowhere else.
 */

import type { Brand } from '../runtime/brand.js';
import { describeCause } from '../errors/formatter.js';

export type CallId = Brand<number, 'CallId'>;

export type UnknownMethodError = Readonly<{
  _tag: 'UnknownMethod';
  method: string;
  message: string;
}>;

export type ExecutionError = Readonly<{
  _tag: 'ExecutionError';
  method: string;
  message: string;
  cause: unknown;
}>;

export type TimeoutError = Readonly<{
  _tag: 'Timeout';
  method: string;
  callId: CallId;
  timeoutMs: number;
  message: string;
}>;

export type OverloadedError = Readonly<{
  _tag: 'Overloaded';
  method: string;
  limit: number;
  message: string;
}>;

export type SignalFailedError = Readonly<{
  _tag: 'SignalFailed';
  method: string;
  eventId: string;
  message: string;
  cause?: unknown;
}>;

export type DispatchError =
  | UnknownMethodError
  | ExecutionError
  | TimeoutError
  | OverloadedError
  | SignalFailedError;

/** What a marshaled call can end in once the main thread has run it. */
export type CallFailure = UnknownMethodError | ExecutionError;

export const DispatchErr = {
  unknownMethod: (method: string): UnknownMethodError => ({
    _tag: 'UnknownMethod',
    method,
    message: `Unknown method: ${method}`,
  }),

  execution: (method: string, cause: unknown): ExecutionError => ({
    _tag: 'ExecutionError',
    method,
    message: cause instanceof Error ? cause.message : describeCause(cause),
    cause,
  }),

  timeout: (method: string, callId: CallId, timeoutMs: number): TimeoutError => ({
    _tag: 'Timeout',
    method,
    callId,
    timeoutMs,
    message: `Main thread execution timeout after ${timeoutMs}ms (${method})`,
  }),

  overloaded: (method: string, limit: number): OverloadedError => ({
    _tag: 'Overloaded',
    method,
    limit,
    message: `Too many pending main-thread calls (limit ${limit})`,
  }),

  signalFailed: (method: string, eventId: string, cause?: unknown): SignalFailedError => ({
    _tag: 'SignalFailed',
    method,
    eventId,
    message:
      cause === undefined
        ? `Host did not accept main-thread signal "${eventId}"`
        : `Host did not accept main-thread signal "${eventId}": ${describeCause(cause)}`,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => DispatchError>;
