import { describe, expect, it } from 'vitest';
import { stripVTControlCharacters } from 'util';
import { errAsync, okAsync } from 'neverthrow';
import type { WorkflowResult } from '../../../src/application/services/recipe-session-service.js';
import { asSessionId } from '../../../src/domain/workflow/ids.js';
import type { SessionView } from '../../../src/usecases/workflow-engine.js';
import {
  OPENING_QUESTION,
  executeChatCommand,
  executeServeCommand,
  executeShowCommand,
  executeSubmitCommand,
  workflowResultToCliResult,
  type ChatIo,
} from '../../../src/cli/commands/index.js';

const s1 = asSessionId('s-1');

const waiting: WorkflowResult = { status: 'waiting', sessionId: s1, prompt: 'Any allergies?', flaggedItems: 'eggs' };
const completed: WorkflowResult = { status: 'completed', sessionId: s1, result: 'Egg-free cake', replayed: false };
const generationFailed: WorkflowResult = {
  status: 'error',
  sessionId: 's-1',
  kind: 'GENERATION_FAILED',
  message: "Step 'generate' failed: upstream unavailable",
  retryable: true,
};

/** Answers submits from a queue and records every call. */
function scriptedSubmit(results: WorkflowResult[]) {
  const calls: Array<readonly [string | undefined, string]> = [];
  const submit = async (sessionId: string | undefined, input: string): Promise<WorkflowResult> => {
    calls.push([sessionId, input]);
    const next = results.shift();
    if (next === undefined) throw new Error(`unexpected submit #${calls.length}`);
    return next;
  };
  return { calls, submit };
}

function scriptedIo(lines: Array<string | null>) {
  const asked: string[] = [];
  const written: string[] = [];
  const io: ChatIo = {
    readLine: async (prompt) => {
      asked.push(prompt);
      return lines.length > 0 ? (lines.shift() ?? null) : null;
    },
    write: (text) => {
      written.push(stripVTControlCharacters(text));
    },
  };
  return { io, asked, written };
}

describe('submit command', () => {
  it('shows the question of a paused session', async () => {
    const { submit, calls } = scriptedSubmit([waiting]);

    const result = await executeSubmitCommand('cake', {}, { submit });

    expect(calls).toEqual([[undefined, 'cake']]);
    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Session s-1 is waiting for your answer',
        body: 'Any allergies?',
        suggestions: ['safeplates submit "<your restrictions>" --session s-1'],
      },
    });
  });

  it('passes the session option through', async () => {
    const { submit, calls } = scriptedSubmit([completed]);

    await executeSubmitCommand('no eggs', { session: 's-1' }, { submit });

    expect(calls).toEqual([['s-1', 'no eggs']]);
  });

  it('labels a replayed recipe', () => {
    expect(workflowResultToCliResult({ ...completed, replayed: true })).toEqual({
      kind: 'success',
      output: {
        message: 'Session s-1 was already complete; showing the stored recipe',
        body: 'Egg-free cake',
      },
    });
  });

  it('exits with the retryable code for a retryable error', () => {
    const result = workflowResultToCliResult(generationFailed);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'retryable' },
      output: {
        message: "GENERATION_FAILED: Step 'generate' failed: upstream unavailable",
        details: ['Session: s-1'],
        suggestions: ['Run the same command again to retry'],
      },
    });
  });

  it('treats an invalid request as misuse', () => {
    const result = workflowResultToCliResult({
      status: 'error',
      sessionId: null,
      kind: 'INVALID_REQUEST',
      message: 'A new session needs a non-empty request',
      retryable: false,
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'A new session needs a non-empty request', suggestions: undefined },
    });
  });

  it('reports a thrown submit as a failure', async () => {
    const { submit } = scriptedSubmit([]);

    const result = await executeSubmitCommand('cake', {}, { submit });

    expect(result.kind).toBe('failure');
    expect(result.output?.message).toBe('Submit failed: unexpected submit #1');
  });
});

describe('show command', () => {
  const view: SessionView = {
    sessionId: s1,
    phase: 'paused',
    currentNode: 'awaitFeedback',
    awaitingInput: true,
    state: {
      request: 'cake',
      draft: 'Cake',
      flaggedItems: 'eggs',
      needsReview: true,
      userFeedback: null,
      result: null,
    },
    updatedAtMs: 1_700_000_000_000,
  };

  it('lists where the session stands', async () => {
    const result = await executeShowCommand('s-1', { inspect: () => okAsync(view) });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Session s-1',
        details: [
          'Phase: paused (waiting for feedback)',
          'Current node: awaitFeedback',
          'Updated: 2023-11-14T22:13:20.000Z',
          'Request: cake',
          'Flagged: eggs',
        ],
        body: undefined,
      },
    });
  });

  it('fails for an unknown session', async () => {
    const result = await executeShowCommand('s-9', {
      inspect: () =>
        errAsync({ code: 'SESSION_NOT_FOUND' as const, message: "Session 's-9' not found", sessionId: asSessionId('s-9') }),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: "Session 's-9' not found", details: undefined, suggestions: undefined },
    });
  });
});

describe('serve command', () => {
  it('reports the listening address', async () => {
    const result = await executeServeCommand({ server: { start: async () => 'http://localhost:8080' }, port: 8080 });

    expect(result.output?.message).toBe('SafePlates API listening on http://localhost:8080');
  });

  it('reports a failed start', async () => {
    const result = await executeServeCommand({
      server: {
        start: async () => {
          throw new Error('listen EADDRINUSE');
        },
      },
      port: 8080,
    });

    expect(result.kind).toBe('failure');
    expect(result.output?.message).toBe('Failed to start server: listen EADDRINUSE');
  });
});

describe('chat command', () => {
  it('asks again on a blank opening line, then follows the session to completion', async () => {
    const { submit, calls } = scriptedSubmit([waiting, completed]);
    const { io, written } = scriptedIo(['', 'cake', 'no eggs']);

    const result = await executeChatCommand({ submit, io });

    expect(calls).toEqual([
      [undefined, 'cake'],
      ['s-1', 'no eggs'],
    ]);
    expect(written).toEqual([OPENING_QUESTION, OPENING_QUESTION, 'Any allergies?']);
    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Recipe ready (session s-1)', body: 'Egg-free cake' },
    });
  });

  it('offers to retry a retryable failure with the same input', async () => {
    const { submit, calls } = scriptedSubmit([generationFailed, completed]);
    const { io, asked } = scriptedIo(['cake', '']);

    const result = await executeChatCommand({ submit, io });

    expect(calls).toEqual([
      [undefined, 'cake'],
      ['s-1', 'cake'],
    ]);
    expect(asked).toEqual(['> ', 'Press Enter to retry, or type "quit" to stop: ']);
    expect(result.kind).toBe('success');
  });

  it('stops on quit after a failure', async () => {
    const { submit } = scriptedSubmit([generationFailed]);
    const { io } = scriptedIo(['cake', 'quit']);

    const result = await executeChatCommand({ submit, io });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'retryable' },
      output: {
        message: 'Stopped after a failed step',
        details: undefined,
        suggestions: ['safeplates chat --session s-1'],
      },
    });
  });

  it('ends on an error that retrying cannot fix', async () => {
    const { submit } = scriptedSubmit([
      { status: 'error', sessionId: 's-1', kind: 'STORAGE_FAILED', message: 'Checkpoint store failed: disk full', retryable: false },
    ]);
    const { io, written } = scriptedIo(['cake']);

    const result = await executeChatCommand({ submit, io });

    expect(written[1]).toBe('⚠️  Checkpoint store failed: disk full');
    expect(result.output?.message).toBe('STORAGE_FAILED: Checkpoint store failed: disk full');
  });

  it('continues a given session and closes at end of input', async () => {
    const { submit } = scriptedSubmit([]);
    const { io, written } = scriptedIo([null]);

    const result = await executeChatCommand({ submit, io }, { session: 's-1' });

    expect(written).toEqual(['Continuing session s-1. Your answer:']);
    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Chat closed', suggestions: ['Resume with: safeplates chat --session s-1'] },
    });
  });
});
