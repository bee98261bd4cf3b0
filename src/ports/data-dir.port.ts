/**
 * Port: on-disk layout of the local checkpoint store.
 *
 * - <root>/sessions/<sessionId>.json
 *
 * All returned paths are absolute; no caller concatenates paths itself.
 */
export interface DataDirPort {
  sessionsDir(): string;
  checkpointPath(sessionId: string): string;
}
