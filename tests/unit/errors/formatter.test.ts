import { describe, expect, it } from 'vitest';
import { Err } from '../../../src/errors/factories.js';
import { formatAppError } from '../../../src/errors/formatter.js';

describe('formatAppError', () => {
  it('lists each workflow graph issue under a startup failure', () => {
    const error = Err.startupFailed('workflow graph', 'Invalid workflow graph', [
      "Node 'generate' has no outgoing edge",
      "Edge from 'checkConcerns' targets unknown node 'publish'",
    ]);

    expect(formatAppError(error)).toBe(
      'Startup failed during workflow graph: Invalid workflow graph\n\n' +
        "  - Node 'generate' has no outgoing edge\n" +
        "  - Edge from 'checkConcerns' targets unknown node 'publish'"
    );
  });

  it('marks a startup failure that carries no details', () => {
    expect(formatAppError(Err.startupFailed('container', 'Logger unavailable'))).toBe(
      'Startup failed during container: Logger unavailable\n\n  - (no details)'
    );
  });

  it('names the cause of an unexpected failure', () => {
    expect(formatAppError(Err.unexpected('Bootstrap crashed', new TypeError('boom')))).toBe(
      'Bootstrap crashed\nCause: TypeError: boom'
    );
    expect(formatAppError(Err.unexpected('Bootstrap crashed', { code: 7 }))).toBe(
      'Bootstrap crashed\nCause: {"code":7}'
    );
  });
});
