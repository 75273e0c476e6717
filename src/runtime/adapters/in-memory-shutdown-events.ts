import type { ShutdownEvent, ShutdownEvents, Unsubscribe } from '../ports/shutdown-events.js';

export class InMemoryShutdownEvents implements ShutdownEvents {
  private readonly listeners = new Set<(event: ShutdownEvent) => void>();

  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShutdownEvent): void {
    // Snapshot: a listener may unsubscribe itself while we iterate.
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
