import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { RequestParams } from '../../bridge/handler.js';
import type { DispatchError } from '../../bridge/dispatch-error.js';
import { describeCause } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Wire format: one JSON object per line.
 *
 *   request   {"method":"ns.verb","params":{...},"id":<any>}
 *   success   {"result":<any>,"id":<echo>}
 *   failure   {"error":"<message>","code":<int>,"id":<echo>}
 */

export const RpcErrorCode = {
  InvalidJson: -32700,
  InvalidRequest: -32600,
  UnknownMethod: -32601,
  InternalError: -32603,
  Timeout: -32001,
  Overloaded: -32002,
  SignalFailed: -32003,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

/** Any JSON value the client chose; echoed back untouched. */
export type RequestId = unknown;

export interface WireRequest {
  readonly method: string;
  readonly params: RequestParams;
  readonly id: RequestId;
}

export type WireSuccess = { readonly result: unknown; readonly id: RequestId };
export type WireFailure = { readonly error: string; readonly code: number; readonly id: RequestId };
export type WireResponse = WireSuccess | WireFailure;

export type MalformedRequestError = Readonly<{ _tag: 'MalformedRequest'; message: string }>;
export type InvalidRequestError = Readonly<{ _tag: 'InvalidRequest'; id: RequestId; message: string }>;
export type ProtocolError = MalformedRequestError | InvalidRequestError;

const RequestSchema = z.object({
  method: z.string().min(1, 'cannot be empty'),
  params: z.record(z.unknown()).optional().default({}),
  id: z.unknown(),
});

export function decodeRequest(line: string): Result<WireRequest, ProtocolError> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return err({ _tag: 'MalformedRequest', message: 'Invalid JSON' });
  }

  const parsed = RequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return err({ _tag: 'InvalidRequest', id: idOf(raw), message: `Invalid request: ${issues}` });
  }

  return ok({
    method: parsed.data.method,
    params: parsed.data.params,
    id: parsed.data.id ?? null,
  });
}

function idOf(raw: unknown): RequestId {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const id: unknown = Reflect.get(raw, 'id');
  return id === undefined ? null : id;
}

export function success(result: unknown, id: RequestId): WireSuccess {
  return { result: result === undefined ? null : result, id };
}

export function failure(message: string, code: number, id: RequestId): WireFailure {
  return { error: message, code, id };
}

export function protocolFailure(error: ProtocolError): WireFailure {
  switch (error._tag) {
    case 'MalformedRequest':
      return failure(error.message, RpcErrorCode.InvalidJson, null);
    case 'InvalidRequest':
      return failure(error.message, RpcErrorCode.InvalidRequest, error.id);
    default:
      return assertNever(error);
  }
}

export function requestTooLarge(limitBytes: number): WireFailure {
  return failure(`Request too large (limit ${limitBytes} bytes)`, RpcErrorCode.InvalidRequest, null);
}

export function dispatchFailure(error: DispatchError, id: RequestId): WireFailure {
  return failure(error.message, codeFor(error), id);
}

function codeFor(error: DispatchError): RpcErrorCode {
  switch (error._tag) {
    case 'UnknownMethod':
      return RpcErrorCode.UnknownMethod;
    case 'ExecutionError':
      return RpcErrorCode.InternalError;
    case 'Timeout':
      return RpcErrorCode.Timeout;
    case 'Overloaded':
      return RpcErrorCode.Overloaded;
    case 'SignalFailed':
      return RpcErrorCode.SignalFailed;
    default:
      return assertNever(error);
  }
}

/**
 * Serialize one response line (without the trailing newline).
 * A result JSON cannot represent (cycles, BigInt, functions, symbols) becomes
 * an internal error for the same id.
 */
export function encodeResponse(response: WireResponse): string {
  try {
    if ('error' in response) return JSON.stringify(response);
    const result = JSON.stringify(response.result);
    if (result === undefined) {
      throw new TypeError(`${typeof response.result} value has no JSON representation`);
    }
    return `{"result":${result},"id":${JSON.stringify(response.id) ?? 'null'}}`;
  } catch (cause) {
    return JSON.stringify(
      failure(`Failed to encode result: ${describeCause(cause)}`, RpcErrorCode.InternalError, response.id)
    );
  }
}
