/**
 * Chat Command
 *
 * Interactive conversation on a line-based terminal. Each line the user
 * types is one submit; the loop ends when a recipe is ready, on end of
 * input, or on an error the same input cannot fix.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { formatAssistant, formatWarning } from '../output-formatter.js';
import type { WorkflowResult } from '../../application/services/recipe-session-service.js';

export interface ChatIo {
  /** Resolves to null at end of input. */
  readLine(prompt: string): Promise<string | null>;
  write(text: string): void;
}

export interface ChatCommandDeps {
  readonly submit: (sessionId: string | undefined, input: string) => Promise<WorkflowResult>;
  readonly io: ChatIo;
}

export interface ChatCommandOptions {
  readonly session?: string;
}

export const OPENING_QUESTION = 'What would you like to cook today?';

export async function executeChatCommand(deps: ChatCommandDeps, options: ChatCommandOptions = {}): Promise<CliResult> {
  const { io } = deps;
  let sessionId = options.session;
  let question = sessionId === undefined ? OPENING_QUESTION : `Continuing session ${sessionId}. Your answer:`;
  // Input of a failed turn, replayed verbatim when the user asks to retry.
  let retryInput: string | null = null;

  for (;;) {
    let input: string;
    if (retryInput !== null) {
      const answer = await io.readLine('Press Enter to retry, or type "quit" to stop: ');
      if (answer === null || answer.trim().toLowerCase() === 'quit') {
        return failure('Stopped after a failed step', {
          exitCode: { kind: 'retryable' },
          suggestions: sessionId !== undefined ? [`safeplates chat --session ${sessionId}`] : undefined,
        });
      }
      input = retryInput;
    } else {
      io.write(formatAssistant(question));
      const line = await io.readLine('> ');
      if (line === null) {
        return success({
          message: 'Chat closed',
          suggestions: sessionId !== undefined ? [`Resume with: safeplates chat --session ${sessionId}`] : undefined,
        });
      }
      if (sessionId === undefined && line.trim().length === 0) continue;
      input = line;
    }

    const result = await deps.submit(sessionId, input);
    switch (result.status) {
      case 'waiting':
        sessionId = result.sessionId;
        question = result.prompt;
        retryInput = null;
        break;

      case 'completed':
        return success({ message: `Recipe ready (session ${result.sessionId})`, body: result.result });

      case 'error':
        if (result.sessionId !== null) sessionId = result.sessionId;
        io.write(formatWarning(result.message));
        if (!result.retryable) {
          return failure(`${result.kind}: ${result.message}`);
        }
        retryInput = input;
        break;
    }
  }
}
