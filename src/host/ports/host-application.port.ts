import type { Result } from 'neverthrow';

/**
 * Port: the slice of the CAD host's scripting API the bridge itself needs.
 *
 * Modelled on a desktop host's custom-event facility: an add-in registers a
 * named event, subscribes to it, and may fire it from any thread. The host
 * queues fired events and delivers them on its main thread, which is the only
 * thread allowed to touch the document model.
 *
 * Guarantees expected from an implementation:
 * - listeners run on the main thread (`ThreadContext.isOnMainThread()` is true)
 * - `fireCustomEvent` never runs listeners synchronously
 * - a throwing listener does not stop delivery to other listeners or events
 */
export interface HostCustomEventArgs {
  readonly eventId: string;
  readonly additionalInfo: string;
}

export type HostCustomEventListener = (args: HostCustomEventArgs) => void;

export interface HostCustomEvent {
  readonly eventId: string;
  add(listener: HostCustomEventListener): boolean;
  remove(listener: HostCustomEventListener): boolean;
}

export type HostEventError = {
  readonly code: 'HOST_EVENT_ALREADY_REGISTERED';
  readonly eventId: string;
  readonly message: string;
};

export interface HostApplication {
  readonly name: string;
  registerCustomEvent(eventId: string): Result<HostCustomEvent, HostEventError>;
  unregisterCustomEvent(eventId: string): boolean;
  /**
   * Queue an event for main-thread delivery.
   * Returns false when no event with that id is registered.
   */
  fireCustomEvent(eventId: string, additionalInfo: string): boolean;
}
