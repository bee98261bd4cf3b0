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

/** `details` holds one entry per problem found, such as each workflow graph issue. */
export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly details: readonly string[];
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/**
 * Process-level failures (configuration, startup). Workflow failures are
 * modelled separately as `WorkflowError` in the domain layer.
 */
export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/**
 * Marks a config object that came out of `loadConfig` (or a test helper that
 * explicitly vouches for it).
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
