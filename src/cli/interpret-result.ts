/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes output plus an exit code.
 * Sets process.exitCode instead of exiting, so open handles (the HTTP
 * server, pino's destination) are closed by their owners.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exitCode = toNumericExitCode(result.exitCode);
  }
}
