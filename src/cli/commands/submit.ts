/**
 * Submit Command
 *
 * One conversation turn: starts a session or continues one.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { WorkflowResult } from '../../application/services/recipe-session-service.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface SubmitCommandDeps {
  readonly submit: (sessionId: string | undefined, input: string) => Promise<WorkflowResult>;
}

export interface SubmitCommandOptions {
  readonly session?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeSubmitCommand(
  input: string,
  options: SubmitCommandOptions,
  deps: SubmitCommandDeps
): Promise<CliResult> {
  try {
    return workflowResultToCliResult(await deps.submit(options.session, input));
  } catch (error) {
    return failure(`Submit failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function workflowResultToCliResult(result: WorkflowResult): CliResult {
  switch (result.status) {
    case 'waiting':
      return success({
        message: `Session ${result.sessionId} is waiting for your answer`,
        body: result.prompt,
        suggestions: [`safeplates submit "<your restrictions>" --session ${result.sessionId}`],
      });

    case 'completed':
      return success({
        message: result.replayed
          ? `Session ${result.sessionId} was already complete; showing the stored recipe`
          : `Recipe ready (session ${result.sessionId})`,
        body: result.result,
      });

    case 'error': {
      const details = result.sessionId !== null ? [`Session: ${result.sessionId}`] : undefined;
      if (result.kind === 'INVALID_REQUEST') return misuse(result.message);
      if (result.retryable) {
        return failure(`${result.kind}: ${result.message}`, {
          exitCode: { kind: 'retryable' },
          details,
          suggestions: ['Run the same command again to retry'],
        });
      }
      return failure(`${result.kind}: ${result.message}`, { details });
    }
  }
}
