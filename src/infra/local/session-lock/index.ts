import { ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { SessionId } from '../../../domain/workflow/ids.js';
import type { SessionLockError, SessionLockHandle, SessionLockPort } from '../../../ports/session-lock.port.js';

export interface InProcessSessionLockOptions {
  /** How long acquire() waits for earlier holders before giving up. */
  readonly waitMs: number;
}

/**
 * Per-session FIFO lock for one engine process.
 *
 * Each acquirer chains onto the previous holder's "turn" promise, so waiters
 * are served in arrival order. A waiter that times out still occupies its slot
 * in the chain but hands it on immediately, so nobody behind it is skipped.
 *
 * Locked behavior:
 * - different sessions never contend
 * - no stale detection: a holder that never releases blocks its session
 */
export class InProcessSessionLock implements SessionLockPort {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly releasers = new Map<symbol, () => void>();

  constructor(private readonly options: InProcessSessionLockOptions) {}

  acquire(sessionId: SessionId): ResultAsync<SessionLockHandle, SessionLockError> {
    const key = String(sessionId);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let endTurn: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      endTurn = resolve;
    });
    const tail: Promise<void> = previous
      .then(() => turn)
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      });
    this.tails.set(key, tail);

    const token = Symbol(`session-lock:${key}`);

    return new ResultAsync(
      this.waitForTurn(previous).then((acquired): Result<SessionLockHandle, SessionLockError> => {
        if (!acquired) {
          endTurn();
          return err({
            code: 'SESSION_LOCK_BUSY',
            message: `Session ${key} is still locked after ${this.options.waitMs}ms`,
            retry: { kind: 'retryable_after_ms', afterMs: 250 },
          });
        }
        this.releasers.set(token, endTurn);
        return ok({ kind: 'session_lock_handle', sessionId, token });
      })
    );
  }

  release(handle: SessionLockHandle): ResultAsync<void, SessionLockError> {
    const endTurn = this.releasers.get(handle.token);
    if (endTurn === undefined) {
      return errAsync({
        code: 'SESSION_LOCK_NOT_HELD',
        message: `Lock handle for session ${handle.sessionId} is not held (double release?)`,
      });
    }
    this.releasers.delete(handle.token);
    endTurn();
    return okAsync(undefined);
  }

  /** Sessions with a holder or waiters. */
  get activeSessionCount(): number {
    return this.tails.size;
  }

  private waitForTurn(previous: Promise<void>): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.options.waitMs);
    });
    return Promise.race([previous.then(() => true), timedOut]).finally(() => clearTimeout(timer));
  }
}
