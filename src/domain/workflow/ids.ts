import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';

/**
 * Opaque session identifier. Session ids become file names in the local
 * checkpoint store, so the accepted alphabet is deliberately narrow.
 */
export type SessionId = Brand<string, 'SessionId'>;

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const SessionIdSchema = z
  .string()
  .regex(SESSION_ID_PATTERN, 'Session id must be 1-128 characters of [A-Za-z0-9_-]')
  .transform((v) => v as SessionId);

export function parseSessionId(raw: string): Result<SessionId, string> {
  const parsed = SessionIdSchema.safeParse(raw);
  return parsed.success ? ok(parsed.data) : err(parsed.error.errors[0]?.message ?? 'Invalid session id');
}

/**
 * Trusted construction (ids minted by the id factory, test fixtures).
 */
export function asSessionId(value: string): SessionId {
  return value as SessionId;
}

export const NODE_IDS = ['generate', 'awaitFeedback', 'finalize'] as const;

export type NodeId = (typeof NODE_IDS)[number];

export const NodeIdSchema = z.enum(NODE_IDS);
