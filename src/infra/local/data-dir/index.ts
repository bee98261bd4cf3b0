import * as path from 'path';
import type { DataDirPort } from '../../../ports/data-dir.port.js';

export class LocalDataDir implements DataDirPort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  sessionsDir(): string {
    return path.join(this.root, 'sessions');
  }

  checkpointPath(sessionId: string): string {
    return path.join(this.sessionsDir(), `${sessionId}.json`);
  }
}
