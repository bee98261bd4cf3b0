import pino from 'pino';
import type { Logger, LogLevel } from '../../src/core/logging/index.js';

/**
 * Fake logger for testing.
 *
 * A real pino logger writing into memory: code under test gets the exact
 * Logger type it asks for, and tests assert on what was logged.
 */
export interface LogEntry {
  readonly level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  readonly msg?: string;
  readonly obj: Readonly<Record<string, unknown>>;
}

const LEVEL_NAMES: Readonly<Record<number, LogEntry['level']>> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class FakeLogger {
  readonly entries: LogEntry[] = [];
  readonly logger: Logger;

  constructor(level: LogLevel = 'trace') {
    this.logger = pino(
      { level, base: undefined, timestamp: false },
      { write: (line: string) => this.capture(line) }
    );
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  clear(): void {
    this.entries.length = 0;
  }

  hasEntry(level: LogEntry['level'], msgContains: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg?.includes(msgContains) === true);
  }

  messages(level: LogEntry['level']): readonly string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.msg ?? '');
  }

  private capture(line: string): void {
    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed) || typeof parsed['level'] !== 'number') return;
    const level = LEVEL_NAMES[parsed['level']];
    if (level === undefined) return;
    const msg = parsed['msg'];
    this.entries.push({ level, msg: typeof msg === 'string' ? msg : undefined, obj: parsed });
  }
}
