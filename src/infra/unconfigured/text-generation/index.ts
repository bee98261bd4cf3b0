import { errAsync, type ResultAsync } from 'neverthrow';
import type { ConcernReport, TextGenerationError, TextGenerationPort } from '../../../ports/text-generation.port.js';

/**
 * Stand-in used when no API key is configured. Read-only commands keep
 * working; any step that needs generation fails with a typed error.
 */
export class UnconfiguredTextGeneration implements TextGenerationPort {
  generateText(_prompt: string): ResultAsync<string, TextGenerationError> {
    return errAsync(this.missingKey());
  }

  classifyConcerns(_text: string, _categories: readonly string[]): ResultAsync<ConcernReport, TextGenerationError> {
    return errAsync(this.missingKey());
  }

  private missingKey(): TextGenerationError {
    return { code: 'TEXT_GENERATION_FAILED', message: 'OPENAI_API_KEY is not set; text generation is unavailable' };
  }
}
