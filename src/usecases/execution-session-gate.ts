import { ResultAsync, err, ok, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { SessionId } from '../domain/workflow/ids.js';
import type { SessionLockHandle, SessionLockPort } from '../ports/session-lock.port.js';

export type ExecutionSessionGateError =
  | {
      readonly code: 'SESSION_LOCKED';
      readonly message: string;
      readonly sessionId: SessionId;
      readonly retry: { readonly kind: 'retryable_after_ms'; readonly afterMs: number };
    }
  | { readonly code: 'LOCK_ACQUIRE_FAILED'; readonly message: string; readonly sessionId: SessionId }
  | { readonly code: 'LOCK_RELEASE_FAILED'; readonly message: string; readonly sessionId: SessionId }
  | { readonly code: 'GATE_CALLBACK_FAILED'; readonly message: string; readonly sessionId: SessionId };

/**
 * Central choke point for per-session locking.
 *
 * Locked behavior:
 * - `fn` runs only while the session lock is held
 * - the lock is released exactly once, whatever `fn` does
 * - a callback error propagates unchanged; a callback that throws becomes
 *   GATE_CALLBACK_FAILED
 * - a failed release wins over the callback's outcome (the session may be wedged)
 */
export class ExecutionSessionGate {
  constructor(
    private readonly lock: SessionLockPort,
    private readonly logger: Logger
  ) {}

  withSessionLock<T, E>(
    sessionId: SessionId,
    fn: () => ResultAsync<T, E>
  ): ResultAsync<T, ExecutionSessionGateError | E> {
    const run = async (): Promise<Result<T, ExecutionSessionGateError | E>> => {
      const acquired = await this.lock.acquire(sessionId);
      if (acquired.isErr()) {
        const e = acquired.error;
        if (e.code === 'SESSION_LOCK_BUSY') {
          this.logger.warn({ sessionId, afterMs: e.retry.afterMs }, 'session lock wait exceeded');
          return err({
            code: 'SESSION_LOCKED',
            message: `Session ${sessionId} is locked by another request`,
            sessionId,
            retry: e.retry,
          });
        }
        return err({ code: 'LOCK_ACQUIRE_FAILED', message: e.message, sessionId });
      }

      const outcome = await this.runHeld(sessionId, fn);
      return this.release(acquired.value).then((released) => (released.isErr() ? err(released.error) : outcome));
    };

    return new ResultAsync(run());
  }

  private async runHeld<T, E>(
    sessionId: SessionId,
    fn: () => ResultAsync<T, E>
  ): Promise<Result<T, ExecutionSessionGateError | E>> {
    try {
      return await fn();
    } catch (e) {
      this.logger.error({ err: e, sessionId }, 'gate callback threw');
      return err({
        code: 'GATE_CALLBACK_FAILED',
        message: e instanceof Error ? e.message : String(e),
        sessionId,
      });
    }
  }

  private async release(handle: SessionLockHandle): Promise<Result<void, ExecutionSessionGateError>> {
    const released = await this.lock.release(handle);
    if (released.isErr()) {
      this.logger.error({ sessionId: handle.sessionId, code: released.error.code }, 'session lock release failed');
      return err({
        code: 'LOCK_RELEASE_FAILED',
        message: `Failed to release session lock: ${released.error.message}`,
        sessionId: handle.sessionId,
      });
    }
    return ok(undefined);
  }
}
