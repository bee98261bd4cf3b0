import { z } from 'zod';

/**
 * The record threaded through the recipe graph.
 *
 * - `result` is non-null iff the terminal node has run
 * - `needsReview` is written once, by `generate`
 * - `userFeedback` stays null until a paused session is resumed
 */
export interface WorkflowState {
  readonly request: string;
  readonly draft: string;
  readonly flaggedItems: string;
  readonly needsReview: boolean;
  readonly userFeedback: string | null;
  readonly result: string | null;
}

export const WorkflowStateSchema = z.object({
  request: z.string(),
  draft: z.string(),
  flaggedItems: z.string(),
  needsReview: z.boolean(),
  userFeedback: z.string().nullable(),
  result: z.string().nullable(),
}) satisfies z.ZodType<WorkflowState>;

export const initialWorkflowState = (request: string): WorkflowState => ({
  request,
  draft: '',
  flaggedItems: '',
  needsReview: false,
  userFeedback: null,
  result: null,
});

/** Feedback counts only when it carries something besides whitespace. */
export function hasFeedback(state: WorkflowState): boolean {
  return state.userFeedback !== null && state.userFeedback.trim().length > 0;
}
