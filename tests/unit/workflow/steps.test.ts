import { describe, expect, it } from 'vitest';
import { createRecipeSteps } from '../../../src/domain/workflow/steps.js';
import { initialWorkflowState, type WorkflowState } from '../../../src/domain/workflow/state.js';
import { DEFAULT_CONCERN_CATEGORIES } from '../../../src/config/app-config.js';
import { ScriptedTextGeneration } from '../../fakes/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function build(generation = new ScriptedTextGeneration()) {
  return { generation, steps: createRecipeSteps({ generation, concernCategories: DEFAULT_CONCERN_CATEGORIES }) };
}

const drafted: WorkflowState = {
  ...initialWorkflowState('chocolate cookies'),
  draft: 'Cookies with butter and eggs',
  flaggedItems: 'dairy, eggs',
  needsReview: true,
};

describe('generate', () => {
  it('drafts a recipe and flags concerns', async () => {
    const { generation, steps } = build();
    generation.replyText('Cookies with butter and eggs').reportConcerns({ found: true, detail: 'dairy, eggs' });

    const next = expectOk(await steps.generate(initialWorkflowState('chocolate cookies')), 'generate');

    expect(generation.prompts).toEqual(['Generate a detailed recipe for: chocolate cookies']);
    expect(generation.classified).toEqual([
      { text: 'Cookies with butter and eggs', categories: DEFAULT_CONCERN_CATEGORIES },
    ]);
    expect(next).toEqual(drafted);
  });

  it('leaves flaggedItems empty when nothing was found', async () => {
    const { generation, steps } = build();
    generation.replyText('Lemon cake').reportConcerns({ found: false, detail: 'ignored' });

    const next = expectOk(await steps.generate(initialWorkflowState('lemon cake')), 'generate');

    expect(next.flaggedItems).toBe('');
    expect(next.needsReview).toBe(false);
    expect(next.draft).toBe('Lemon cake');
  });

  it('fails without touching the input state when generation fails', async () => {
    const { generation, steps } = build();
    generation.failText();
    const input = initialWorkflowState('lemon cake');

    const error = expectErr(await steps.generate(input), 'generate');

    expect(error.code).toBe('GENERATION_FAILED');
    expect(error.cause.code).toBe('TEXT_GENERATION_FAILED');
    expect(input).toEqual(initialWorkflowState('lemon cake'));
  });

  it('fails when the concern check fails', async () => {
    const { generation, steps } = build();
    generation.replyText('Lemon cake').failConcerns({ code: 'TEXT_GENERATION_TIMEOUT', message: 'slow', timeoutMs: 5 });

    const error = expectErr(await steps.generate(initialWorkflowState('lemon cake')), 'generate');

    expect(error.cause).toEqual({ code: 'TEXT_GENERATION_TIMEOUT', message: 'slow', timeoutMs: 5 });
  });
});

describe('awaitFeedback', () => {
  it('passes the state through unchanged', async () => {
    const { steps } = build();
    const state = { ...drafted, userFeedback: 'no dairy' };
    expect(expectOk(await steps.awaitFeedback(state), 'awaitFeedback')).toEqual(state);
  });
});

describe('finalize', () => {
  it('copies the draft when there is no feedback', async () => {
    const { generation, steps } = build();

    const next = expectOk(await steps.finalize({ ...drafted, needsReview: false }), 'finalize');

    expect(next.result).toBe('Cookies with butter and eggs');
    expect(generation.prompts).toEqual([]);
  });

  it('copies the draft when the feedback is only whitespace', async () => {
    const { generation, steps } = build();

    const next = expectOk(await steps.finalize({ ...drafted, userFeedback: '  \n' }), 'finalize');

    expect(next.result).toBe('Cookies with butter and eggs');
    expect(generation.prompts).toEqual([]);
  });

  it('revises the draft with the feedback', async () => {
    const { generation, steps } = build();
    generation.replyText('Cookies with oat milk, no eggs');

    const next = expectOk(await steps.finalize({ ...drafted, userFeedback: 'no dairy please' }), 'finalize');

    expect(generation.prompts).toEqual([
      'Modify this recipe according to dietary restrictions: Cookies with butter and eggs\nRestrictions: no dairy please',
    ]);
    expect(next.result).toBe('Cookies with oat milk, no eggs');
    expect(next.draft).toBe('Cookies with butter and eggs');
  });

  it('fails when the revision fails', async () => {
    const { generation, steps } = build();
    generation.failText();

    const error = expectErr(await steps.finalize({ ...drafted, userFeedback: 'no dairy' }), 'finalize');

    expect(error.code).toBe('GENERATION_FAILED');
  });
});
