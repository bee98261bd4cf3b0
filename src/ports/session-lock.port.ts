import type { ResultAsync } from 'neverthrow';
import type { SessionId } from '../domain/workflow/ids.js';

export type SessionLockError =
  | {
      readonly code: 'SESSION_LOCK_BUSY';
      readonly message: string;
      readonly retry: { readonly kind: 'retryable_after_ms'; readonly afterMs: number };
    }
  | { readonly code: 'SESSION_LOCK_NOT_HELD'; readonly message: string };

export interface SessionLockHandle {
  readonly kind: 'session_lock_handle';
  readonly sessionId: SessionId;
  readonly token: symbol;
}

/**
 * Port: per-session mutual exclusion.
 *
 * Guarantees:
 * - At most one holder per session
 * - Waiters are served in arrival order
 * - acquire() gives up with SESSION_LOCK_BUSY after the configured wait
 * - release() is required after a successful acquire()
 *
 * When to use:
 * - Via ExecutionSessionGate only
 */
export interface SessionLockPort {
  acquire(sessionId: SessionId): ResultAsync<SessionLockHandle, SessionLockError>;
  release(handle: SessionLockHandle): ResultAsync<void, SessionLockError>;
}
