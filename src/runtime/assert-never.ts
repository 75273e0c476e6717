/**
 * Compile-time exhaustiveness check for `switch` over a discriminated union.
 * Reaching it at runtime means a union member was added without a case.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
