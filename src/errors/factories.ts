import type { AppError, ConfigIssue, ConfigInvalidError, StartupFailedError, UnexpectedError } from './app-error.js';

/** Constructors for process-level failures; workflow failures use `WorkflowErr`. */
export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid SafePlates configuration',
  }),

  startupFailed: (phase: string, message: string, details: readonly string[] = []): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    details,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
