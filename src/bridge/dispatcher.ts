import { z } from 'zod';
import { ok, err, errAsync, ResultAsync, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { StartupFailedError } from '../errors/app-error.js';
import type {
  HostApplication,
  HostCustomEvent,
  HostCustomEventArgs,
} from '../host/ports/host-application.port.js';
import type { RequestParams } from './handler.js';
import type { HandlerRegistry } from './handler-registry.js';
import { invokeHandler } from './invoke-handler.js';
import { parseCallId, type CallOutcome, type PendingCall, type PendingCallTable } from './pending-call-table.js';
import { DispatchErr, type CallId, type DispatchError, type SignalFailedError } from './dispatch-error.js';

export interface MainThreadProbe {
  isOnMainThread(): boolean;
}

export interface DispatcherOptions {
  readonly eventId: string;
  readonly callTimeoutMs: number;
}

const SignalPayloadSchema = z.object({ callId: z.string() });

export function encodeSignalPayload(id: CallId): string {
  return JSON.stringify({ callId: String(id) });
}

function decodeSignalPayload(additionalInfo: string): CallId | null {
  let raw: unknown;
  try {
    raw = JSON.parse(additionalInfo);
  } catch {
    return null;
  }
  const parsed = SignalPayloadSchema.safeParse(raw);
  return parsed.success ? parseCallId(parsed.data.callId) : null;
}

/**
 * Runs handlers on the host's main thread, wherever the request came in.
 *
 * On the main thread a call runs in place. Anywhere else it is parked in the
 * pending-call table, the host is asked (through a custom event whose payload
 * is only the call id) to run it on the main thread, and the caller waits for
 * the table entry to settle or for the call timeout.
 *
 * The main-thread side is `handleCustomEvent`. It runs inside the host's own
 * event loop, so nothing may escape it: every failure ends up either in the
 * call's outcome or in the log.
 */
export class MainThreadDispatcher {
  private event: HostCustomEvent | null = null;

  constructor(
    private readonly registry: HandlerRegistry,
    private readonly calls: PendingCallTable,
    private readonly host: HostApplication,
    private readonly threads: MainThreadProbe,
    private readonly options: DispatcherOptions,
    private readonly logger: Logger
  ) {}

  get isAttached(): boolean {
    return this.event !== null;
  }

  /** Register the custom event with the host and start listening on it. */
  attach(): Result<void, StartupFailedError> {
    if (this.event) return ok(undefined);

    const registered = this.host.registerCustomEvent(this.options.eventId);
    if (registered.isErr()) {
      return err(Err.startupFailed('register_event', registered.error.message, registered.error));
    }

    const event = registered.value;
    event.add(this.handleCustomEvent);
    this.event = event;
    this.logger.debug({ eventId: this.options.eventId, host: this.host.name }, 'Attached to host custom event');
    return ok(undefined);
  }

  detach(): void {
    const event = this.event;
    if (!event) return;
    this.event = null;
    event.remove(this.handleCustomEvent);
    this.host.unregisterCustomEvent(event.eventId);
    this.logger.debug({ eventId: event.eventId }, 'Detached from host custom event');
  }

  dispatch(method: string, params: RequestParams): ResultAsync<unknown, DispatchError> {
    const handler = this.registry.lookup(method);
    if (handler.isErr()) {
      return errAsync(handler.error);
    }

    if (this.threads.isOnMainThread()) {
      return invokeHandler(method, handler.value, params, this.logger);
    }

    return this.marshal(method, params);
  }

  // ---------------------------------------------------------------------------
  // Worker side
  // ---------------------------------------------------------------------------

  private marshal(method: string, params: RequestParams): ResultAsync<unknown, DispatchError> {
    const opened = this.calls.open(method, params);
    if (opened.isErr()) {
      this.logger.warn({ method, pending: this.calls.size }, 'Pending-call table full');
      return errAsync(opened.error);
    }

    const call = opened.value;
    const signalled = this.signal(call);
    if (signalled.isErr()) {
      this.calls.abandon(call.id);
      this.logger.error({ method, callId: call.id, err: signalled.error.cause }, signalled.error.message);
      return errAsync(signalled.error);
    }

    return new ResultAsync(this.awaitCompletion(call));
  }

  private signal(call: PendingCall): Result<void, SignalFailedError> {
    try {
      return this.host.fireCustomEvent(this.options.eventId, encodeSignalPayload(call.id))
        ? ok(undefined)
        : err(DispatchErr.signalFailed(call.method, this.options.eventId));
    } catch (cause) {
      return err(DispatchErr.signalFailed(call.method, this.options.eventId, cause));
    }
  }

  private awaitCompletion(call: PendingCall): Promise<Result<unknown, DispatchError>> {
    const timeoutMs = this.options.callTimeoutMs;

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        // The handler may still be running; its completion will find no entry.
        this.calls.abandon(call.id);
        this.logger.warn({ method: call.method, callId: call.id, timeoutMs }, 'Main-thread call timed out');
        resolve(err(DispatchErr.timeout(call.method, call.id, timeoutMs)));
      }, timeoutMs);

      void call.settled.then((outcome) => {
        clearTimeout(timer);
        this.calls.take(call.id);
        resolve(outcome.mapErr((failure): DispatchError => failure));
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Main-thread side
  // ---------------------------------------------------------------------------

  private readonly handleCustomEvent = (args: HostCustomEventArgs): void => {
    try {
      this.runMarshaledCall(args.additionalInfo);
    } catch (error) {
      this.logger.error({ err: error, eventId: args.eventId }, 'Custom event callback failed');
    }
  };

  private runMarshaledCall(additionalInfo: string): void {
    const callId = decodeSignalPayload(additionalInfo);
    if (callId === null) {
      this.logger.warn({ additionalInfo }, 'Ignoring custom event with malformed payload');
      return;
    }

    const call = this.calls.get(callId);
    if (!call) {
      this.logger.debug({ callId }, 'No pending call for signal; caller already gave up');
      return;
    }

    this.logger.debug({ callId, method: call.method, params: call.params }, 'Running call on main thread');

    const handler = this.registry.lookup(call.method);
    const execution: ResultAsync<unknown, DispatchError> = handler.isOk()
      ? invokeHandler(call.method, handler.value, call.params, this.logger)
      : errAsync(handler.error);

    void execution.then((outcome) => this.settle(call, outcome));
  }

  private settle(call: PendingCall, outcome: Result<unknown, DispatchError>): void {
    try {
      const completed = this.calls.complete(call.id, toCallOutcome(outcome));
      if (!completed) {
        this.logger.debug({ callId: call.id, method: call.method }, 'Orphaned completion dropped');
      }
    } catch (error) {
      this.logger.error({ err: error, callId: call.id }, 'Failed to record call outcome');
    }
  }
}

function toCallOutcome(outcome: Result<unknown, DispatchError>): CallOutcome {
  if (outcome.isOk()) return ok(outcome.value);
  const failure = outcome.error;
  switch (failure._tag) {
    case 'UnknownMethod':
    case 'ExecutionError':
      return err(failure);
    default:
      // Only lookup and invocation run on this side; anything else is a bug.
      return err(DispatchErr.execution(failure.method, new Error(failure.message)));
  }
}
