import type { HandlerModule } from './handler-module.js';

/** Built-in diagnostics every add-in exposes. */
export const systemModule: HandlerModule = {
  name: 'system',
  register(registry) {
    registry.register('system.ping', () => ({ pong: true }));
    registry.register('system.list_methods', () => ({ methods: registry.methods() }));
  },
};
