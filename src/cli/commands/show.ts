/**
 * Show Command
 *
 * Prints where a session stands without running anything.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import { describePhase } from '../../domain/workflow/checkpoint.js';
import type { WorkflowError } from '../../domain/workflow/errors.js';
import type { SessionView } from '../../usecases/workflow-engine.js';

export interface ShowCommandDeps {
  readonly inspect: (sessionId: string) => ResultAsync<SessionView, WorkflowError>;
}

export async function executeShowCommand(sessionId: string, deps: ShowCommandDeps): Promise<CliResult> {
  const result = await deps.inspect(sessionId);
  if (result.isErr()) {
    const error = result.error;
    return error.code === 'INVALID_REQUEST' ? misuse(error.message) : failure(error.message);
  }

  const view = result.value;
  const details = [
    `Phase: ${describePhase(view.phase)}`,
    `Current node: ${view.currentNode}`,
    `Updated: ${new Date(view.updatedAtMs).toISOString()}`,
    `Request: ${view.state.request}`,
  ];
  if (view.state.flaggedItems.length > 0) details.push(`Flagged: ${view.state.flaggedItems}`);
  if (view.state.userFeedback !== null) details.push(`Feedback: ${view.state.userFeedback}`);

  return success({
    message: `Session ${view.sessionId}`,
    details,
    body: view.state.result ?? undefined,
  });
}
