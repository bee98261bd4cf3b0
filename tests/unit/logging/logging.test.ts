import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { REDACTION_CONFIG, resolveLogLevel } from '../../../src/core/logging/index.js';

describe('resolveLogLevel', () => {
  it('reads SAFEPLATES_LOG_LEVEL case-insensitively', () => {
    expect(resolveLogLevel({ SAFEPLATES_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('stays silent when unset or unknown', () => {
    expect(resolveLogLevel({})).toBe('silent');
    expect(resolveLogLevel({ SAFEPLATES_LOG_LEVEL: 'loud' })).toBe('silent');
  });
});

describe('REDACTION_CONFIG', () => {
  it('masks the API key wherever config carries it', () => {
    const lines: string[] = [];
    const logger = pino(
      { redact: REDACTION_CONFIG, base: undefined, timestamp: false },
      { write: (line: string) => lines.push(line) }
    );

    logger.info(
      {
        apiKey: 'test-secret',
        config: { generation: { apiKey: 'test-secret', model: 'gpt-4' } },
        headers: { authorization: 'Bearer test-secret', 'x-api-key': 'test-secret' },
      },
      'configured'
    );

    const entry: unknown = JSON.parse(lines[0] ?? '{}');
    expect(entry).toEqual({
      level: 30,
      msg: 'configured',
      apiKey: '[REDACTED]',
      config: { generation: { apiKey: '[REDACTED]', model: 'gpt-4' } },
      headers: { authorization: '[REDACTED]', 'x-api-key': '[REDACTED]' },
    });
  });
});
