import { errAsync, type ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { isRetryable, WorkflowErr, type WorkflowError, type WorkflowErrorKind } from '../../domain/workflow/errors.js';
import { parseSessionId, type SessionId } from '../../domain/workflow/ids.js';
import type { IdFactoryPort } from '../../ports/id-factory.port.js';
import type { SessionView, WorkflowEngine, WorkflowOutcome } from '../../usecases/workflow-engine.js';

/**
 * What a conversation turn produces, as handed to the CLI and HTTP layers.
 * Failures are values here; nothing past this point inspects WorkflowError.
 */
export type WorkflowResult =
  | WorkflowOutcome
  | {
      readonly status: 'error';
      readonly sessionId: string | null;
      readonly kind: WorkflowErrorKind;
      readonly message: string;
      readonly retryable: boolean;
    };

export function toErrorResult(error: WorkflowError): WorkflowResult {
  return {
    status: 'error',
    sessionId: 'sessionId' in error ? error.sessionId : null,
    kind: error.code,
    message: error.message,
    retryable: isRetryable(error.code),
  };
}

export class RecipeSessionService {
  constructor(
    private readonly engine: WorkflowEngine,
    private readonly ids: IdFactoryPort,
    private readonly logger: Logger
  ) {}

  /**
   * One conversation turn. Without a session id a new session is minted and
   * `input` is the recipe request; with one, `input` continues that session.
   */
  async submit(rawSessionId: string | undefined, input: string): Promise<WorkflowResult> {
    const sessionId = this.resolveSessionId(rawSessionId);
    if (sessionId.kind === 'invalid') {
      return toErrorResult(WorkflowErr.invalidRequest(sessionId.message));
    }

    const result = await this.engine.submit(sessionId.value, input);
    if (result.isErr()) {
      this.logger.debug({ sessionId: sessionId.value, kind: result.error.code }, 'submit failed');
      return toErrorResult(result.error);
    }
    return result.value;
  }

  inspect(rawSessionId: string): ResultAsync<SessionView, WorkflowError> {
    const parsed = parseSessionId(rawSessionId);
    if (parsed.isErr()) return errAsync(WorkflowErr.invalidRequest(parsed.error));
    return this.engine.inspect(parsed.value);
  }

  private resolveSessionId(
    raw: string | undefined
  ): { readonly kind: 'ok'; readonly value: SessionId } | { readonly kind: 'invalid'; readonly message: string } {
    if (raw === undefined) return { kind: 'ok', value: this.ids.mintSessionId() };
    const parsed = parseSessionId(raw);
    return parsed.isOk() ? { kind: 'ok', value: parsed.value } : { kind: 'invalid', message: parsed.error };
  }
}
