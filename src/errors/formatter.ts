import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'StartupFailed': {
      const base = `Startup failed during ${error.phase}: ${error.message}`;
      return error.cause !== undefined ? `${base}\nCause: ${describeCause(error.cause)}` : base;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${describeCause(error.cause)}`;

    default:
      return assertNever(error);
  }
}

/**
 * One-line rendering of an arbitrary thrown value.
 * Also used when turning handler failures into wire messages.
 */
export function describeCause(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return String(value);
  }
}
