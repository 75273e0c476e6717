import { ok, err, type Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { ThreadContext } from '../thread-context.js';
import type {
  HostApplication,
  HostCustomEvent,
  HostCustomEventArgs,
  HostCustomEventListener,
  HostEventError,
} from '../ports/host-application.port.js';

class InProcessCustomEvent implements HostCustomEvent {
  private readonly listeners = new Set<HostCustomEventListener>();

  constructor(readonly eventId: string) {}

  add(listener: HostCustomEventListener): boolean {
    if (this.listeners.has(listener)) return false;
    this.listeners.add(listener);
    return true;
  }

  remove(listener: HostCustomEventListener): boolean {
    return this.listeners.delete(listener);
  }

  snapshot(): readonly HostCustomEventListener[] {
    return [...this.listeners];
  }
}

/**
 * Host stand-in that runs inside the Node process.
 *
 * Used by `cadlink serve` and by the test suites. Fired events are queued and
 * delivered one per event-loop turn on the main-thread context, the way a
 * desktop host pumps its message queue between UI work.
 */
export class InProcessHost implements HostApplication {
  readonly name = 'in-process';

  private readonly events = new Map<string, InProcessCustomEvent>();
  private readonly queue: HostCustomEventArgs[] = [];
  private scheduled = false;

  constructor(
    private readonly threads: ThreadContext,
    private readonly logger: Logger
  ) {}

  registerCustomEvent(eventId: string): Result<HostCustomEvent, HostEventError> {
    if (this.events.has(eventId)) {
      return err({
        code: 'HOST_EVENT_ALREADY_REGISTERED',
        eventId,
        message: `Custom event "${eventId}" is already registered`,
      });
    }
    const event = new InProcessCustomEvent(eventId);
    this.events.set(eventId, event);
    return ok(event);
  }

  unregisterCustomEvent(eventId: string): boolean {
    return this.events.delete(eventId);
  }

  fireCustomEvent(eventId: string, additionalInfo: string): boolean {
    if (!this.events.has(eventId)) return false;
    this.queue.push({ eventId, additionalInfo });
    this.schedule();
    return true;
  }

  /** Events fired but not yet delivered. */
  get queuedEvents(): number {
    return this.queue.length;
  }

  /** Enter the host's main thread, as the host does when it loads an add-in. */
  runOnMainThread<T>(fn: () => T): T {
    return this.threads.runOnMainThread(fn);
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.threads.runOnMainThread(() => this.deliverNext());
      if (this.queue.length > 0) this.schedule();
    });
  }

  private deliverNext(): void {
    const next = this.queue.shift();
    if (!next) return;

    // Unregistered between fire and delivery: the host drops it.
    const event = this.events.get(next.eventId);
    if (!event) {
      this.logger.debug({ eventId: next.eventId }, 'Dropped event for unregistered custom event');
      return;
    }

    for (const listener of event.snapshot()) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error({ err: error, eventId: next.eventId }, 'Custom event listener threw');
      }
    }
  }
}
