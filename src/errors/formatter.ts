import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Renders a process-level failure for the terminal: a headline, then one
 * bullet per issue so each problem can be fixed on its own.
 */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid':
      return withBullets(
        error.message,
        error.issues.map((i) => `${i.path}: ${i.message}`)
      );

    case 'StartupFailed':
      return withBullets(`Startup failed during ${error.phase}: ${error.message}`, error.details);

    case 'Unexpected':
      return `${error.message}\nCause: ${describeCause(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function withBullets(headline: string, items: readonly string[]): string {
  const lines = items.length > 0 ? items : ['(no details)'];
  return `${headline}\n\n${lines.map((line) => `  - ${line}`).join('\n')}`;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
