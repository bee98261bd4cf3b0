import * as fs from 'fs/promises';
import * as path from 'path';
import { ResultAsync as RA, errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Checkpoint } from '../../../domain/workflow/checkpoint.js';
import type { SessionId } from '../../../domain/workflow/ids.js';
import type { CheckpointStoreError, CheckpointStorePort } from '../../../ports/checkpoint-store.port.js';
import type { DataDirPort } from '../../../ports/data-dir.port.js';
import { checkSessionKey, decodeCheckpoint, encodeCheckpoint } from '../../checkpoint-codec.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function mapIoError(e: unknown, filePath: string): CheckpointStoreError {
  const code = nodeErrorCode(e);
  if (code === 'EACCES' || code === 'EPERM') {
    return { code: 'CHECKPOINT_STORE_IO_ERROR', message: `Permission denied: ${filePath}` };
  }
  return {
    code: 'CHECKPOINT_STORE_IO_ERROR',
    message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
  };
}

/**
 * One JSON document per session under `<dataDir>/sessions/`.
 *
 * Locked behavior:
 * - save = write temp file, fsync, rename over the target (crash-safe)
 * - a missing file is "unknown session", not an error
 * - unreadable JSON or a schema mismatch is corruption, never "unknown"
 */
export class LocalCheckpointStore implements CheckpointStorePort {
  constructor(private readonly dataDir: DataDirPort) {}

  load(sessionId: SessionId): ResultAsync<Checkpoint | null, CheckpointStoreError> {
    const filePath = this.dataDir.checkpointPath(sessionId);
    return RA.fromPromise(
      (async (): Promise<string | null> => {
        try {
          return await fs.readFile(filePath, 'utf8');
        } catch (e) {
          if (nodeErrorCode(e) === 'ENOENT') return null;
          throw e;
        }
      })(),
      (e) => mapIoError(e, filePath)
    ).andThen((raw) => {
      if (raw === null) return okAsync(null);
      const decoded = decodeCheckpoint(raw, filePath);
      return decoded.isOk() ? okAsync(decoded.value) : errAsync(decoded.error);
    });
  }

  save(sessionId: SessionId, checkpoint: Checkpoint): ResultAsync<void, CheckpointStoreError> {
    const keyCheck = checkSessionKey(sessionId, checkpoint);
    if (keyCheck.isErr()) return errAsync(keyCheck.error);

    const filePath = this.dataDir.checkpointPath(sessionId);
    const tmpPath = `${filePath}.tmp`;
    const body = encodeCheckpoint(checkpoint);

    return RA.fromPromise(
      (async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        const handle = await fs.open(tmpPath, 'w', 0o600);
        try {
          await handle.writeFile(body, 'utf8');
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(tmpPath, filePath);
      })(),
      (e) => mapIoError(e, filePath)
    );
  }

  exists(sessionId: SessionId): ResultAsync<boolean, CheckpointStoreError> {
    const filePath = this.dataDir.checkpointPath(sessionId);
    return RA.fromPromise(
      (async () => {
        try {
          await fs.access(filePath);
          return true;
        } catch (e) {
          if (nodeErrorCode(e) === 'ENOENT') return false;
          throw e;
        }
      })(),
      (e) => mapIoError(e, filePath)
    );
  }
}
