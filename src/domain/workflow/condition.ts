import type { WorkflowState } from './state.js';

/** Edge labels leaving `generate`. */
export type ReviewRoute = 'needsReview' | 'proceed';

/**
 * Branch decision on exit from `generate`. Pure and total.
 */
export function routeAfterGenerate(state: Pick<WorkflowState, 'needsReview'>): ReviewRoute {
  return state.needsReview ? 'needsReview' : 'proceed';
}
