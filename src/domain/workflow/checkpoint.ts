import { z } from 'zod';
import { assertNever } from '../../runtime/assert-never.js';
import { NodeIdSchema, SessionIdSchema, type NodeId, type SessionId } from './ids.js';
import { WorkflowStateSchema, type WorkflowState } from './state.js';

/**
 * Persisted form of a session: its position in the graph plus the state.
 * The store owns it; the engine only ever holds a transient copy.
 */
export interface Checkpoint {
  readonly v: 1;
  readonly sessionId: SessionId;
  readonly currentNode: NodeId;
  readonly awaitingInput: boolean;
  readonly state: WorkflowState;
  readonly updatedAtMs: number;
}

export const CheckpointV1Schema: z.ZodType<Checkpoint, z.ZodTypeDef, unknown> = z.object({
  v: z.literal(1),
  sessionId: SessionIdSchema,
  currentNode: NodeIdSchema,
  awaitingInput: z.boolean(),
  state: WorkflowStateSchema,
  updatedAtMs: z.number().int().nonnegative(),
});

/**
 * Derived, never stored.
 * - completed: the terminal node ran (`result` set)
 * - paused: stopped before an interrupt node, waiting for input
 * - running: created, or interrupted by a failed call and waiting for a retry
 */
export type SessionPhase = 'running' | 'paused' | 'completed';

export function sessionPhaseOf(checkpoint: Checkpoint): SessionPhase {
  if (checkpoint.state.result !== null) return 'completed';
  if (checkpoint.awaitingInput) return 'paused';
  return 'running';
}

/**
 * The input that started the run a `running` checkpoint belongs to: the
 * feedback once a paused session was resumed, the original request before.
 * A retry must present this same input.
 */
export function pendingInputOf(checkpoint: Checkpoint): string {
  return checkpoint.state.userFeedback ?? checkpoint.state.request;
}

export function describePhase(phase: SessionPhase): string {
  switch (phase) {
    case 'running':
      return 'running (will re-attempt the current node on retry)';
    case 'paused':
      return 'paused (waiting for feedback)';
    case 'completed':
      return 'completed';
    default:
      return assertNever(phase);
  }
}
