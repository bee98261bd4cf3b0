import OpenAI from 'openai';
import { ResultAsync as RA, errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Logger } from '../../../core/logging/index.js';
import type {
  ConcernReport,
  TextGenerationError,
  TextGenerationPort,
} from '../../../ports/text-generation.port.js';

export const CONCERNS_FOUND_MARKER = 'ALLERGENS FOUND';
export const NO_CONCERNS_MARKER = 'NO ALLERGENS';

export interface OpenAITextGenerationOptions {
  readonly apiKey: string;
  readonly baseURL: string | null;
  readonly model: string;
  readonly timeoutMs: number;
}

export function buildConcernPrompt(text: string, categories: readonly string[]): string {
  return (
    `Analyze this recipe for common allergens (${categories.join(', ')}). ` +
    `Only respond with '${CONCERNS_FOUND_MARKER}' plus the allergens detected or '${NO_CONCERNS_MARKER}': ${text}`
  );
}

// "NO ALLERGENS FOUND" and similar negatives contain the found marker too.
const FOUND_PATTERN = new RegExp(`(?<!\\bNO\\s+)${CONCERNS_FOUND_MARKER}`, 'i');

/**
 * Reads the classifier's answer. Only an un-negated "found" marker counts;
 * the detail is what follows it, minus separators.
 */
export function parseConcernReply(reply: string): ConcernReport {
  const match = FOUND_PATTERN.exec(reply);
  if (match === null) return { found: false, detail: '' };
  const detail = reply
    .slice(match.index + match[0].length)
    .replace(/^[\s:\-]+/, '')
    .trim();
  return { found: true, detail };
}

/**
 * TextGenerationPort over the OpenAI chat completions API.
 * One request per call, no SDK retries. The timeout aborts the request itself.
 */
export class OpenAITextGeneration implements TextGenerationPort {
  private readonly client: OpenAI;

  constructor(
    private readonly options: OpenAITextGenerationOptions,
    private readonly logger: Logger
  ) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL ?? undefined,
      maxRetries: 0,
    });
  }

  generateText(prompt: string): ResultAsync<string, TextGenerationError> {
    return this.complete(prompt);
  }

  classifyConcerns(text: string, categories: readonly string[]): ResultAsync<ConcernReport, TextGenerationError> {
    return this.complete(buildConcernPrompt(text, categories)).map(parseConcernReply);
  }

  private complete(prompt: string): ResultAsync<string, TextGenerationError> {
    const { model, timeoutMs } = this.options;
    const startedAt = Date.now();
    const signal = AbortSignal.timeout(timeoutMs);

    return RA.fromPromise(
      this.client.chat.completions.create(
        {
          model,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      ),
      (e): TextGenerationError => {
        if (signal.aborted) {
          return {
            code: 'TEXT_GENERATION_TIMEOUT',
            message: `Chat completion timed out after ${timeoutMs}ms`,
            timeoutMs,
          };
        }
        return {
          code: 'TEXT_GENERATION_FAILED',
          message: `Chat completion failed: ${e instanceof Error ? e.message : String(e)}`,
        };
      }
    ).andThen((response) => {
      const content = response.choices[0]?.message.content ?? '';
      this.logger.debug(
        { model, durationMs: Date.now() - startedAt, completionTokens: response.usage?.completion_tokens ?? 0 },
        'chat completion received'
      );
      if (content.trim().length === 0) {
        return errAsync<string, TextGenerationError>({
          code: 'TEXT_GENERATION_EMPTY',
          message: 'Chat completion returned no content',
        });
      }
      return okAsync<string, TextGenerationError>(content);
    });
  }
}
