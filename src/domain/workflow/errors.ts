import { assertNever } from '../../runtime/assert-never.js';
import type { CheckpointStoreError } from '../../ports/checkpoint-store.port.js';
import type { TextGenerationError } from '../../ports/text-generation.port.js';
import type { NodeId, SessionId } from './ids.js';

/**
 * Failure of an external generation call inside a step. The step commits
 * nothing, so re-submitting the same input re-attempts the same node.
 */
export interface StepError {
  readonly code: 'GENERATION_FAILED';
  readonly message: string;
  readonly cause: TextGenerationError;
}

/**
 * Everything `submit`/`inspect` can fail with, as seen by callers.
 */
export type WorkflowError =
  | {
      readonly code: 'GENERATION_FAILED';
      readonly message: string;
      readonly sessionId: SessionId;
      readonly node: NodeId;
      readonly cause: TextGenerationError;
    }
  | { readonly code: 'STORAGE_FAILED'; readonly message: string; readonly sessionId: SessionId; readonly cause: CheckpointStoreError }
  | { readonly code: 'UNEXPECTED_INPUT'; readonly message: string; readonly sessionId: SessionId }
  | { readonly code: 'SESSION_NOT_FOUND'; readonly message: string; readonly sessionId: SessionId }
  | {
      readonly code: 'SESSION_BUSY';
      readonly message: string;
      readonly sessionId: SessionId;
      readonly retry: { readonly kind: 'retryable_after_ms'; readonly afterMs: number };
    }
  | { readonly code: 'INVALID_REQUEST'; readonly message: string }
  | { readonly code: 'INTERNAL'; readonly message: string; readonly sessionId: SessionId | null };

export type WorkflowErrorKind = WorkflowError['code'];

/**
 * Whether re-issuing the identical call is sensible. Generation failures
 * left the last checkpoint untouched; a busy session frees up on its own.
 */
export function isRetryable(kind: WorkflowErrorKind): boolean {
  switch (kind) {
    case 'GENERATION_FAILED':
    case 'SESSION_BUSY':
      return true;
    case 'STORAGE_FAILED':
    case 'UNEXPECTED_INPUT':
    case 'SESSION_NOT_FOUND':
    case 'INVALID_REQUEST':
    case 'INTERNAL':
      return false;
    default:
      return assertNever(kind);
  }
}

export const WorkflowErr = {
  generationFailed: (sessionId: SessionId, node: NodeId, e: StepError): WorkflowError => ({
    code: 'GENERATION_FAILED',
    message: `Step '${node}' failed: ${e.message}`,
    sessionId,
    node,
    cause: e.cause,
  }),
  storageFailed: (sessionId: SessionId, cause: CheckpointStoreError): WorkflowError => ({
    code: 'STORAGE_FAILED',
    message: `Checkpoint store failed: ${cause.message}`,
    sessionId,
    cause,
  }),
  unexpectedInput: (sessionId: SessionId, message: string): WorkflowError => ({
    code: 'UNEXPECTED_INPUT',
    message,
    sessionId,
  }),
  sessionNotFound: (sessionId: SessionId): WorkflowError => ({
    code: 'SESSION_NOT_FOUND',
    message: `Session '${sessionId}' not found`,
    sessionId,
  }),
  sessionBusy: (sessionId: SessionId, afterMs: number): WorkflowError => ({
    code: 'SESSION_BUSY',
    message: `Session '${sessionId}' is busy with another request; retry shortly`,
    sessionId,
    retry: { kind: 'retryable_after_ms', afterMs },
  }),
  invalidRequest: (message: string): WorkflowError => ({ code: 'INVALID_REQUEST', message }),
  internal: (sessionId: SessionId | null, message: string): WorkflowError => ({
    code: 'INTERNAL',
    message,
    sessionId,
  }),
} as const;
