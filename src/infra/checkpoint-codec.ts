import { err, ok, type Result } from 'neverthrow';
import { CheckpointV1Schema, type Checkpoint } from '../domain/workflow/checkpoint.js';
import type { SessionId } from '../domain/workflow/ids.js';
import type { CheckpointStoreError } from '../ports/checkpoint-store.port.js';

export function encodeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(checkpoint);
}

/**
 * Parses and schema-checks a stored document. `source` only feeds error
 * messages (file path, memory key).
 */
export function decodeCheckpoint(raw: string, source: string): Result<Checkpoint, CheckpointStoreError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return err({ code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED', message: `Invalid JSON checkpoint: ${source}` });
  }

  const validated = CheckpointV1Schema.safeParse(parsed);
  if (!validated.success) {
    return err({ code: 'CHECKPOINT_STORE_CORRUPTION_DETECTED', message: `Invalid checkpoint document: ${source}` });
  }
  return ok(validated.data);
}

export function checkSessionKey(sessionId: SessionId, checkpoint: Checkpoint): Result<void, CheckpointStoreError> {
  if (checkpoint.sessionId !== sessionId) {
    return err({
      code: 'CHECKPOINT_STORE_INVARIANT_VIOLATION',
      message: `Checkpoint for '${checkpoint.sessionId}' cannot be saved under '${sessionId}'`,
    });
  }
  return ok(undefined);
}
