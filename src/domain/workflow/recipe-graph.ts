import type { Result } from 'neverthrow';
import { routeAfterGenerate } from './condition.js';
import { conditionalEdge, directEdge, validateGraph } from './graph.js';
import type { GraphDefinition, GraphDefinitionError, GraphTopology } from './graph.js';
import { NODE_IDS, type NodeId } from './ids.js';
import type { WorkflowState } from './state.js';

/**
 * generate ──needsReview──▶ awaitFeedback ──▶ finalize
 *    └────────proceed──────────────────────────▲
 *
 * Execution pauses before `awaitFeedback` until the user answers.
 */
export const RECIPE_GRAPH_TOPOLOGY: GraphTopology<WorkflowState, NodeId> = {
  nodes: NODE_IDS,
  entry: 'generate',
  terminal: 'finalize',
  edges: {
    generate: conditionalEdge<WorkflowState, NodeId, ReturnType<typeof routeAfterGenerate>>(routeAfterGenerate, {
      needsReview: 'awaitFeedback',
      proceed: 'finalize',
    }),
    awaitFeedback: directEdge<WorkflowState, NodeId>('finalize'),
  },
  interruptBefore: ['awaitFeedback'],
};

export type RecipeGraph = GraphDefinition<WorkflowState, NodeId>;

export function loadRecipeGraph(): Result<RecipeGraph, GraphDefinitionError> {
  return validateGraph(RECIPE_GRAPH_TOPOLOGY);
}
