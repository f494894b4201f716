import type { Brand } from '../runtime/brand.js';

/**
 * Errors raised while bringing the process up (before any engine operation runs).
 * Engine operations have their own taxonomy in `engine/domain/errors.ts`.
 */

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type EnvFileUnreadableError = Readonly<{
  readonly _tag: 'EnvFileUnreadable';
  readonly envFile: string;
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | EnvFileUnreadableError | StartupFailedError | UnexpectedError;

/**
 * Branded config type: only `loadConfig` (or test construction) can produce it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
