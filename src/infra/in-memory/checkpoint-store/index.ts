import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Checkpoint } from '../../../domain/workflow/checkpoint.js';
import type { SessionId } from '../../../domain/workflow/ids.js';
import type { CheckpointStoreError, CheckpointStorePort } from '../../../ports/checkpoint-store.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import { checkSessionKey, decodeCheckpoint, encodeCheckpoint } from '../../checkpoint-codec.js';

export interface InMemoryCheckpointStoreOptions {
  /** Entries older than this are treated as absent; every save sweeps them out. */
  readonly ttlMs?: number | null;
  readonly clock: TimeClockPort;
}

interface Entry {
  readonly json: string;
  readonly savedAtMs: number;
}

/**
 * Process-local checkpoint store.
 *
 * Documents are kept serialized: a caller mutating the object it saved (or
 * loaded) can never change what the store holds, and replacing a Map entry
 * is the atomic write.
 */
export class InMemoryCheckpointStore implements CheckpointStorePort {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly options: InMemoryCheckpointStoreOptions) {}

  load(sessionId: SessionId): ResultAsync<Checkpoint | null, CheckpointStoreError> {
    const entry = this.live(sessionId);
    if (entry === undefined) return okAsync(null);
    const decoded = decodeCheckpoint(entry.json, `memory:${sessionId}`);
    return decoded.isOk() ? okAsync(decoded.value) : errAsync(decoded.error);
  }

  save(sessionId: SessionId, checkpoint: Checkpoint): ResultAsync<void, CheckpointStoreError> {
    const keyCheck = checkSessionKey(sessionId, checkpoint);
    if (keyCheck.isErr()) return errAsync(keyCheck.error);

    this.evictExpired();
    this.entries.set(sessionId, { json: encodeCheckpoint(checkpoint), savedAtMs: this.options.clock.nowMs() });
    return okAsync(undefined);
  }

  exists(sessionId: SessionId): ResultAsync<boolean, CheckpointStoreError> {
    return okAsync(this.live(sessionId) !== undefined);
  }

  /** Number of live sessions. */
  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  private live(sessionId: SessionId): Entry | undefined {
    const entry = this.entries.get(sessionId);
    if (entry === undefined) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }

  private evictExpired(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(key);
    }
  }

  private isExpired(entry: Entry): boolean {
    const ttlMs = this.options.ttlMs ?? null;
    return ttlMs !== null && this.options.clock.nowMs() - entry.savedAtMs >= ttlMs;
  }
}
