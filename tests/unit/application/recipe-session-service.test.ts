import { describe, expect, it } from 'vitest';
import { RecipeSessionService } from '../../../src/application/services/recipe-session-service.js';
import { asSessionId } from '../../../src/domain/workflow/ids.js';
import { createEngineHarness } from '../../helpers/engine-harness.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

function setup() {
  const harness = createEngineHarness();
  const service = new RecipeSessionService(
    harness.engine,
    { mintSessionId: () => asSessionId('minted-1') },
    harness.log.logger
  );
  return { ...harness, service };
}

describe('RecipeSessionService', () => {
  it('mints a session id for a new conversation', async () => {
    const { service, generation } = setup();
    generation.replyText('Pancake recipe');

    expect(await service.submit(undefined, 'pancakes')).toEqual({
      status: 'completed',
      sessionId: 'minted-1',
      result: 'Pancake recipe',
      replayed: false,
    });
  });

  it('continues the session it is given', async () => {
    const { service, generation } = setup();
    generation.replyText('Cookie recipe', 'Vegan cookie recipe').reportConcerns({ found: true, detail: 'dairy' });

    const first = await service.submit('kitchen-7', 'cookies');
    const second = await service.submit('kitchen-7', 'no dairy');

    expect(first.status).toBe('waiting');
    expect(first.sessionId).toBe('kitchen-7');
    expect(second).toEqual({
      status: 'completed',
      sessionId: 'kitchen-7',
      result: 'Vegan cookie recipe',
      replayed: false,
    });
  });

  it('rejects a malformed session id', async () => {
    const { service, store } = setup();

    expect(await service.submit('../etc/passwd', 'x')).toEqual({
      status: 'error',
      sessionId: null,
      kind: 'INVALID_REQUEST',
      message: 'Session id must be 1-128 characters of [A-Za-z0-9_-]',
      retryable: false,
    });
    expect(store.saves).toHaveLength(0);
  });

  it('marks generation failures as retryable', async () => {
    const { service, generation } = setup();
    generation.failText();

    expect(await service.submit(undefined, 'soup')).toEqual({
      status: 'error',
      sessionId: 'minted-1',
      kind: 'GENERATION_FAILED',
      message: "Step 'generate' failed: upstream unavailable",
      retryable: true,
    });
  });

  it('inspects a stored session', async () => {
    const { service, generation } = setup();
    generation.replyText('Pancake recipe');
    await service.submit('s-1', 'pancakes');

    const view = expectOk(await service.inspect('s-1'), 'inspect');

    expect(view.phase).toBe('completed');
    expect(view.state.result).toBe('Pancake recipe');
  });

  it('refuses to inspect a malformed id', async () => {
    const { service } = setup();

    expect(expectErr(await service.inspect('no spaces allowed'), 'inspect').code).toBe('INVALID_REQUEST');
  });
});
