import { errAsync, ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { HandlerError, type Handler, type RequestParams } from './handler.js';
import { DispatchErr, type ExecutionError } from './dispatch-error.js';

/**
 * Call a handler inside a failure boundary.
 *
 * The handler runs synchronously in the caller's context (so a main-thread
 * caller stays on the main thread); a returned promise is awaited. Synchronous
 * throws and rejections both come back as `ExecutionError`. The returned
 * ResultAsync never rejects.
 */
export function invokeHandler(
  method: string,
  handler: Handler,
  params: RequestParams,
  logger: Logger
): ResultAsync<unknown, ExecutionError> {
  let returned: unknown;
  try {
    returned = handler(params);
  } catch (cause) {
    return errAsync(toExecutionError(method, cause, logger));
  }
  return ResultAsync.fromPromise(Promise.resolve(returned), (cause) => toExecutionError(method, cause, logger));
}

function toExecutionError(method: string, cause: unknown, logger: Logger): ExecutionError {
  if (cause instanceof HandlerError) {
    logger.warn({ method, details: cause.details }, `Handler rejected call: ${cause.message}`);
  } else {
    logger.error({ err: cause, method }, 'Handler threw');
  }
  return DispatchErr.execution(method, cause);
}
