import { ok, err, type Result } from 'neverthrow';
import type { Handler } from './handler.js';
import { DispatchErr, type UnknownMethodError } from './dispatch-error.js';

/**
 * Method name -> handler.
 *
 * Filled in while the add-in starts (single-threaded), then frozen by
 * `BridgeServer.start()`. After that it is only read, from both the worker and
 * the main-thread side, which is what makes it safe to share without locking.
 * Re-registering a method before the freeze replaces the previous handler.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, Handler>();
  private frozen = false;

  register(method: string, handler: Handler): void {
    if (method.trim() === '') {
      throw new Error('[HandlerRegistry] Method name cannot be empty');
    }
    if (this.frozen) {
      throw new Error(`[HandlerRegistry] Cannot register "${method}" after the server has started`);
    }
    this.handlers.set(method, handler);
  }

  lookup(method: string): Result<Handler, UnknownMethodError> {
    const handler = this.handlers.get(method);
    return handler ? ok(handler) : err(DispatchErr.unknownMethod(method));
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.handlers.size;
  }

  methods(): readonly string[] {
    return [...this.handlers.keys()].sort();
  }
}
