/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - general errors
  | { kind: 'misuse' }         // 2 - misuse of command (bad args, etc)
  | { kind: 'retryable' };     // 75 - temporary failure (EX_TEMPFAIL), same call may succeed

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'retryable':
      return 75;
  }
}
