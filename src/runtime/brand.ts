/**
 * Nominal typing for values that passed a boundary check.
 *
 * `Brand<number, 'CallId'>` is still a number at runtime, but a bare number
 * cannot be passed where a CallId is expected without going through the
 * function that mints it.
 *
 * NOTE: string-keyed marker rather than `unique symbol`, so zod schemas that
 * transform into branded types can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
