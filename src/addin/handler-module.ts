import type { HandlerRegistry } from '../bridge/handler-registry.js';

/**
 * A namespace of handlers ("sketch.*", "body.*", ...) registered together
 * while the add-in starts.
 */
export interface HandlerModule {
  readonly name: string;
  register(registry: HandlerRegistry): void;
}
