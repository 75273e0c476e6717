import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * Something the add-in needs at startup was unavailable: the port was taken,
 * the host refused to register the custom event, etc.
 */
export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: StartupPhase;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type StartupPhase = 'listen' | 'register_event' | 'register_handlers';

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/**
 * Marks a config object as having come out of `loadConfig` (or the test-only
 * constructor), so raw objects can't be passed where validated config is required.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
