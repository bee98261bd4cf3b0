/**
 * Recipe API routes.
 *
 * POST /api/messages        -> WorkflowResult (status code follows the result)
 * GET  /api/sessions/:id    -> { success: true, data: SessionView } | { success: false, error }
 *
 * Handlers are plain functions over the service so they can be exercised
 * without a socket; `mountApiRoutes` only adapts them to express.
 */
import type { Application, Request, Response } from 'express';
import { z } from 'zod';
import { assertNever } from '../../runtime/assert-never.js';
import type { WorkflowErrorKind } from '../../domain/workflow/errors.js';
import { WorkflowErr } from '../../domain/workflow/errors.js';
import {
  toErrorResult,
  type RecipeSessionService,
  type WorkflowResult,
} from '../../application/services/recipe-session-service.js';

export interface ApiResponse {
  readonly status: number;
  readonly body: unknown;
}

export const SubmitMessageBodySchema = z.object({
  sessionId: z.string().optional(),
  input: z.string(),
});

export function httpStatusForError(kind: WorkflowErrorKind): number {
  switch (kind) {
    case 'INVALID_REQUEST':
      return 400;
    case 'SESSION_NOT_FOUND':
      return 404;
    case 'UNEXPECTED_INPUT':
    case 'SESSION_BUSY':
      return 409;
    case 'GENERATION_FAILED':
      return 502;
    case 'STORAGE_FAILED':
    case 'INTERNAL':
      return 500;
    default:
      return assertNever(kind);
  }
}

export function httpStatusFor(result: WorkflowResult): number {
  return result.status === 'error' ? httpStatusForError(result.kind) : 200;
}

export async function handleSubmitMessage(service: RecipeSessionService, body: unknown): Promise<ApiResponse> {
  const parsed = SubmitMessageBodySchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join('.') || '(body)'}: ${e.message}`).join('; ');
    const result = toErrorResult(WorkflowErr.invalidRequest(`Invalid request body: ${detail}`));
    return { status: httpStatusFor(result), body: result };
  }

  const result = await service.submit(parsed.data.sessionId, parsed.data.input);
  return { status: httpStatusFor(result), body: result };
}

export async function handleGetSession(service: RecipeSessionService, sessionId: string): Promise<ApiResponse> {
  const result = await service.inspect(sessionId);
  return result.match(
    (view): ApiResponse => ({ status: 200, body: { success: true, data: view } }),
    (error): ApiResponse => ({
      status: httpStatusForError(error.code),
      body: { success: false, error: error.message },
    })
  );
}

export function mountApiRoutes(app: Application, service: RecipeSessionService): void {
  app.post('/api/messages', async (req: Request, res: Response) => {
    try {
      const { status, body } = await handleSubmitMessage(service, req.body);
      res.status(status).json(body);
    } catch (error) {
      res.status(500).json({ success: false, error: error instanceof Error ? error.message : String(error) });
    }
  });

  app.get('/api/sessions/:sessionId', async (req: Request, res: Response) => {
    try {
      const { status, body } = await handleGetSession(service, req.params['sessionId'] ?? '');
      res.status(status).json(body);
    } catch (error) {
      res.status(500).json({ success: false, error: error instanceof Error ? error.message : String(error) });
    }
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ success: true, status: 'healthy' });
  });
}
