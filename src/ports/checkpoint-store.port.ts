import type { ResultAsync } from 'neverthrow';
import type { Checkpoint } from '../domain/workflow/checkpoint.js';
import type { SessionId } from '../domain/workflow/ids.js';

export type CheckpointStoreError =
  | { readonly code: 'CHECKPOINT_STORE_IO_ERROR'; readonly message: string }
  | { readonly code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED'; readonly message: string }
  | { readonly code: 'CHECKPOINT_STORE_INVARIANT_VIOLATION'; readonly message: string };

/**
 * Port: latest checkpoint per session.
 *
 * Guarantees:
 * - save() is atomic per session: readers see the old or the new document,
 *   never a torn one
 * - load() after a successful save() returns that exact value
 * - load() returns null when the session is unknown (not an error)
 * - Distinct sessions may be used concurrently; callers serialize access to
 *   one session (see ExecutionSessionGate)
 */
export interface CheckpointStorePort {
  load(sessionId: SessionId): ResultAsync<Checkpoint | null, CheckpointStoreError>;
  save(sessionId: SessionId, checkpoint: Checkpoint): ResultAsync<void, CheckpointStoreError>;
  exists(sessionId: SessionId): ResultAsync<boolean, CheckpointStoreError>;
}
