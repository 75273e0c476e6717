import { AsyncLocalStorage } from 'async_hooks';

/**
 * Which "thread" a piece of code is running on, from the host's point of view.
 *
 * Node gives the add-in one JavaScript thread, so the host's main thread and
 * the socket workers are modelled as execution contexts carried across awaits
 * by AsyncLocalStorage. Code outside any context counts as off the main thread:
 * only host event dispatch and `runOnMainThread` are main-thread.
 */
export type ThreadTag =
  | { readonly kind: 'main' }
  | { readonly kind: 'worker'; readonly workerId: string };

/**
 * The narrow capability a connection worker needs: run its request
 * processing in a worker context.
 */
export interface WorkerScope {
  runOnWorker<T>(workerId: string, fn: () => T): T;
}

export class ThreadContext implements WorkerScope {
  private readonly storage = new AsyncLocalStorage<ThreadTag>();

  current(): ThreadTag | undefined {
    return this.storage.getStore();
  }

  isOnMainThread(): boolean {
    return this.storage.getStore()?.kind === 'main';
  }

  runOnMainThread<T>(fn: () => T): T {
    return this.storage.run({ kind: 'main' }, fn);
  }

  runOnWorker<T>(workerId: string, fn: () => T): T {
    return this.storage.run({ kind: 'worker', workerId }, fn);
  }
}
