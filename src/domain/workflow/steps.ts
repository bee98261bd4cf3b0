import { okAsync, type ResultAsync } from 'neverthrow';
import type { TextGenerationError, TextGenerationPort } from '../../ports/text-generation.port.js';
import type { StepError } from './errors.js';
import type { NodeId } from './ids.js';
import { buildRecipePrompt, buildRevisionPrompt } from './prompts.js';
import { hasFeedback, type WorkflowState } from './state.js';

/**
 * A step returns the next state or fails without touching its input:
 * states are replaced, never mutated.
 */
export type StepFn<S> = (state: S) => ResultAsync<S, StepError>;

export type StepRegistry<S, N extends string> = Readonly<Record<N, StepFn<S>>>;

export interface RecipeStepDeps {
  readonly generation: TextGenerationPort;
  readonly concernCategories: readonly string[];
}

const toStepError = (cause: TextGenerationError): StepError => ({
  code: 'GENERATION_FAILED',
  message: cause.message,
  cause,
});

export function createRecipeSteps(deps: RecipeStepDeps): StepRegistry<WorkflowState, NodeId> {
  const generate: StepFn<WorkflowState> = (state) =>
    deps.generation
      .generateText(buildRecipePrompt(state.request))
      .andThen((draft) =>
        deps.generation.classifyConcerns(draft, deps.concernCategories).map((report) => ({
          ...state,
          draft,
          flaggedItems: report.found ? report.detail : '',
          needsReview: report.found,
        }))
      )
      .mapErr(toStepError);

  // Pure position marker: the pause happens before it, the engine owns the flag.
  const awaitFeedback: StepFn<WorkflowState> = (state) => okAsync(state);

  const finalize: StepFn<WorkflowState> = (state) => {
    if (state.userFeedback === null || !hasFeedback(state)) {
      return okAsync({ ...state, result: state.draft });
    }
    return deps.generation
      .generateText(buildRevisionPrompt(state.draft, state.userFeedback))
      .map((revised) => ({ ...state, result: revised }))
      .mapErr(toStepError);
  };

  return { generate, awaitFeedback, finalize };
}
