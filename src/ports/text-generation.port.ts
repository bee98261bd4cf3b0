import type { ResultAsync } from 'neverthrow';

export type TextGenerationError =
  | { readonly code: 'TEXT_GENERATION_FAILED'; readonly message: string }
  | { readonly code: 'TEXT_GENERATION_TIMEOUT'; readonly message: string; readonly timeoutMs: number }
  | { readonly code: 'TEXT_GENERATION_EMPTY'; readonly message: string };

/**
 * Outcome of a concern (allergen) check. `detail` is plain text describing
 * what matched, already stripped of any marker the model was told to emit.
 */
export interface ConcernReport {
  readonly found: boolean;
  readonly detail: string;
}

/**
 * Port: the opaque text-completion capability the steps call.
 *
 * Guarantees:
 * - Single shot: no retries behind the caller's back
 * - Every failure (API error, timeout, empty completion) is a typed error,
 *   never a thrown exception
 */
export interface TextGenerationPort {
  generateText(prompt: string): ResultAsync<string, TextGenerationError>;
  classifyConcerns(text: string, categories: readonly string[]): ResultAsync<ConcernReport, TextGenerationError>;
}
