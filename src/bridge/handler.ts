/**
 * Handler contract shared by every method the bridge exposes.
 *
 * A handler receives the request's `params` object untouched and returns the
 * value to send back as `result` (directly or as a promise). It signals failure
 * by throwing; the dispatcher turns the throw into an `ExecutionError` and the
 * protocol layer turns that into a wire error. Handlers never see the wire format.
 *
 * Handlers run only on the host's main thread.
 */
export type RequestParams = Readonly<Record<string, unknown>>;

export type Handler = (params: RequestParams) => unknown;

/**
 * The failure a handler throws on purpose (bad parameter, missing sketch, ...).
 * Logged as a warning without a stack; any other thrown value is treated as a
 * bug in the handler and logged at error level.
 */
export class HandlerError extends Error {
  constructor(
    message: string,
    readonly details?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = 'HandlerError';
  }
}
