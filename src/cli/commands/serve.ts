/**
 * Serve Command
 *
 * Starts the HTTP API. Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';

export interface ApiServer {
  start(port: number): Promise<string>;
}

export interface ServeCommandDeps {
  readonly server: ApiServer;
  readonly port: number;
}

/**
 * Resolves once the listener is up; the process then stays alive on the
 * open socket until interrupted.
 */
export async function executeServeCommand(deps: ServeCommandDeps): Promise<CliResult> {
  try {
    const baseUrl = await deps.server.start(deps.port);
    return success({
      message: `SafePlates API listening on ${baseUrl}`,
      details: [`POST ${baseUrl}/api/messages`, `GET  ${baseUrl}/api/sessions/:sessionId`],
    });
  } catch (error) {
    return failure(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  }
}
