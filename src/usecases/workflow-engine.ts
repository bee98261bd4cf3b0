import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import {
  pendingInputOf,
  sessionPhaseOf,
  type Checkpoint,
  type SessionPhase,
} from '../domain/workflow/checkpoint.js';
import { WorkflowErr, type WorkflowError } from '../domain/workflow/errors.js';
import { isInterruptNode, nextNode } from '../domain/workflow/graph.js';
import type { NodeId, SessionId } from '../domain/workflow/ids.js';
import { buildFeedbackPrompt } from '../domain/workflow/prompts.js';
import type { RecipeGraph } from '../domain/workflow/recipe-graph.js';
import { initialWorkflowState, type WorkflowState } from '../domain/workflow/state.js';
import type { StepRegistry } from '../domain/workflow/steps.js';
import type { CheckpointStorePort } from '../ports/checkpoint-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ExecutionSessionGate, ExecutionSessionGateError } from './execution-session-gate.js';

export type WorkflowOutcome =
  | {
      readonly status: 'waiting';
      readonly sessionId: SessionId;
      readonly prompt: string;
      readonly flaggedItems: string;
    }
  | {
      readonly status: 'completed';
      readonly sessionId: SessionId;
      readonly result: string;
      /** True when the stored result was returned without running anything. */
      readonly replayed: boolean;
    };

export interface SessionView {
  readonly sessionId: SessionId;
  readonly phase: SessionPhase;
  readonly currentNode: NodeId;
  readonly awaitingInput: boolean;
  readonly state: WorkflowState;
  readonly updatedAtMs: number;
}

export interface WorkflowEngineDeps {
  readonly graph: RecipeGraph;
  readonly steps: StepRegistry<WorkflowState, NodeId>;
  readonly store: CheckpointStorePort;
  readonly gate: ExecutionSessionGate;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
}

/**
 * Drives a session through the recipe graph, one checkpoint per node.
 *
 * Locked behavior:
 * - every submit for a session runs under that session's lock
 * - a checkpoint is written once on creation, then once after each node
 * - a failed step writes nothing; the stored checkpoint still points at it
 * - a completed session is never re-run, only replayed
 */
export class WorkflowEngine {
  constructor(private readonly deps: WorkflowEngineDeps) {}

  submit(sessionId: SessionId, input: string): ResultAsync<WorkflowOutcome, WorkflowError> {
    return this.deps.gate
      .withSessionLock(sessionId, () => this.submitLocked(sessionId, input))
      .mapErr((e) => fromGateError(sessionId, e));
  }

  inspect(sessionId: SessionId): ResultAsync<SessionView, WorkflowError> {
    return this.load(sessionId).andThen((checkpoint) => {
      if (checkpoint === null) return errAsync(WorkflowErr.sessionNotFound(sessionId));
      return okAsync({
        sessionId: checkpoint.sessionId,
        phase: sessionPhaseOf(checkpoint),
        currentNode: checkpoint.currentNode,
        awaitingInput: checkpoint.awaitingInput,
        state: checkpoint.state,
        updatedAtMs: checkpoint.updatedAtMs,
      });
    });
  }

  private submitLocked(sessionId: SessionId, input: string): ResultAsync<WorkflowOutcome, WorkflowError> {
    return this.load(sessionId).andThen((checkpoint): ResultAsync<WorkflowOutcome, WorkflowError> => {
      if (checkpoint === null) return this.start(sessionId, input);

      const phase = sessionPhaseOf(checkpoint);
      switch (phase) {
        case 'completed':
          return this.replay(checkpoint);
        case 'paused':
          return this.resume(checkpoint, input);
        case 'running':
          return this.retry(checkpoint, input);
        default:
          return assertNever(phase);
      }
    });
  }

  private start(sessionId: SessionId, request: string): ResultAsync<WorkflowOutcome, WorkflowError> {
    if (request.trim().length === 0) {
      return errAsync(WorkflowErr.invalidRequest('A new session needs a non-empty request'));
    }

    const checkpoint: Checkpoint = {
      v: 1,
      sessionId,
      currentNode: this.deps.graph.entry,
      awaitingInput: false,
      state: initialWorkflowState(request),
      updatedAtMs: this.deps.clock.nowMs(),
    };
    this.deps.logger.info({ sessionId }, 'session created');
    return this.save(checkpoint).andThen(() => this.drive(checkpoint));
  }

  private replay(checkpoint: Checkpoint): ResultAsync<WorkflowOutcome, WorkflowError> {
    const { sessionId } = checkpoint;
    const result = checkpoint.state.result;
    if (result === null) {
      return errAsync(WorkflowErr.internal(sessionId, 'Completed session has no stored result'));
    }
    this.deps.logger.info({ sessionId }, 'replaying completed session');
    return okAsync({ status: 'completed' as const, sessionId, result, replayed: true });
  }

  /** The feedback lands in state; the write after the next node records it. */
  private resume(checkpoint: Checkpoint, feedback: string): ResultAsync<WorkflowOutcome, WorkflowError> {
    this.deps.logger.info({ sessionId: checkpoint.sessionId, node: checkpoint.currentNode }, 'resuming paused session');
    return this.drive({
      ...checkpoint,
      awaitingInput: false,
      state: { ...checkpoint.state, userFeedback: feedback },
    });
  }

  private retry(checkpoint: Checkpoint, input: string): ResultAsync<WorkflowOutcome, WorkflowError> {
    const { sessionId } = checkpoint;
    if (input !== pendingInputOf(checkpoint)) {
      return errAsync(
        WorkflowErr.unexpectedInput(
          sessionId,
          `Session '${sessionId}' is not waiting for input; re-submit the previous input to retry step '${checkpoint.currentNode}'`
        )
      );
    }
    this.deps.logger.info({ sessionId, node: checkpoint.currentNode }, 'retrying interrupted step');
    return this.drive(checkpoint);
  }

  private drive(checkpoint: Checkpoint): ResultAsync<WorkflowOutcome, WorkflowError> {
    const { sessionId, currentNode: node } = checkpoint;
    this.deps.logger.debug({ sessionId, node }, 'node started');

    return this.deps.steps[node](checkpoint.state)
      .mapErr((e) => {
        this.deps.logger.warn({ sessionId, node, cause: e.cause.code }, 'node failed');
        return WorkflowErr.generationFailed(sessionId, node, e);
      })
      .andThen((state) => {
        this.deps.logger.debug({ sessionId, node }, 'node finished');
        return this.advance(checkpoint, state);
      });
  }

  private advance(from: Checkpoint, state: WorkflowState): ResultAsync<WorkflowOutcome, WorkflowError> {
    const { sessionId, currentNode } = from;
    const next = nextNode(this.deps.graph, currentNode, state);
    if (next.isErr()) return errAsync(WorkflowErr.internal(sessionId, next.error.message));

    const target = next.value;
    if (target === null) {
      const result = state.result;
      if (result === null) {
        return errAsync(WorkflowErr.internal(sessionId, `Terminal node '${currentNode}' produced no result`));
      }
      return this.save({ ...from, awaitingInput: false, state, updatedAtMs: this.deps.clock.nowMs() }).map(() => {
        this.deps.logger.info({ sessionId }, 'session completed');
        return { status: 'completed' as const, sessionId, result, replayed: false };
      });
    }

    const pause = isInterruptNode(this.deps.graph, target);
    const checkpoint: Checkpoint = {
      ...from,
      currentNode: target,
      awaitingInput: pause,
      state,
      updatedAtMs: this.deps.clock.nowMs(),
    };

    return this.save(checkpoint).andThen((): ResultAsync<WorkflowOutcome, WorkflowError> => {
      if (!pause) return this.drive(checkpoint);
      this.deps.logger.info({ sessionId, node: target }, 'session paused for feedback');
      return okAsync({
        status: 'waiting' as const,
        sessionId,
        prompt: buildFeedbackPrompt(state.flaggedItems),
        flaggedItems: state.flaggedItems,
      });
    });
  }

  private load(sessionId: SessionId): ResultAsync<Checkpoint | null, WorkflowError> {
    return this.deps.store.load(sessionId).mapErr((e) => {
      this.deps.logger.error({ sessionId, code: e.code, message: e.message }, 'checkpoint load failed');
      return WorkflowErr.storageFailed(sessionId, e);
    });
  }

  private save(checkpoint: Checkpoint): ResultAsync<void, WorkflowError> {
    const { sessionId } = checkpoint;
    return this.deps.store.save(sessionId, checkpoint).mapErr((e) => {
      this.deps.logger.error({ sessionId, code: e.code, message: e.message }, 'checkpoint save failed');
      return WorkflowErr.storageFailed(sessionId, e);
    });
  }
}

function fromGateError(sessionId: SessionId, e: ExecutionSessionGateError | WorkflowError): WorkflowError {
  switch (e.code) {
    case 'SESSION_LOCKED':
      return WorkflowErr.sessionBusy(sessionId, e.retry.afterMs);
    case 'LOCK_ACQUIRE_FAILED':
    case 'LOCK_RELEASE_FAILED':
    case 'GATE_CALLBACK_FAILED':
      return WorkflowErr.internal(sessionId, e.message);
    default:
      return e;
  }
}
