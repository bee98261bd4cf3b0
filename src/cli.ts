#!/usr/bin/env node
/**
 * SafePlates CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Initializes the container (config errors end the command here)
 * 2. Wires services into each command
 * 3. Interprets CliResult into an exit code
 *
 * All command logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import * as readline from 'readline';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import { formatAppError } from './errors/formatter.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { RecipeSessionService } from './application/services/recipe-session-service.js';
import type { HttpServer } from './infrastructure/http/HttpServer.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { misuse } from './cli/types/cli-result.js';
import type { ChatIo } from './cli/commands/chat.js';
import {
  executeChatCommand,
  executeServeCommand,
  executeShowCommand,
  executeSubmitCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolves the session service, or reports the startup error and returns
 * null (exit code already set).
 */
async function resolveService(): Promise<RecipeSessionService | null> {
  const init = await initializeContainer();
  if (init.isErr()) {
    createBootstrapLogger('cli').error({ tag: init.error._tag }, 'container initialization failed');
    console.error(formatAppError(init.error));
    process.exitCode = 1;
    return null;
  }
  return container.resolve<RecipeSessionService>(DI.Services.RecipeSession);
}

function createTerminalIo(): { readonly io: ChatIo; close(): void } {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    io: {
      async readLine(prompt: string): Promise<string | null> {
        process.stdout.write(prompt);
        const next = await lines.next();
        return next.done === true ? null : next.value;
      },
      write(text: string): void {
        console.log(text);
      },
    },
    close: () => rl.close(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('safeplates')
  .description('Recipe assistant that checks dishes for allergens before you cook them')
  .version('0.1.0');

program
  .command('chat')
  .description('Start (or resume) an interactive recipe conversation')
  .option('-s, --session <id>', 'Resume an existing session')
  .action(async (options: { session?: string }) => {
    const service = await resolveService();
    if (service === null) return;

    const terminal = createTerminalIo();
    try {
      const result = await executeChatCommand(
        { submit: (sessionId, input) => service.submit(sessionId, input), io: terminal.io },
        { session: options.session }
      );
      interpretCliResult(result);
    } finally {
      terminal.close();
    }
  });

program
  .command('submit <input>')
  .description('Send one message: a recipe request, or your answer to a paused session')
  .option('-s, --session <id>', 'Continue this session instead of starting a new one')
  .action(async (input: string, options: { session?: string }) => {
    const service = await resolveService();
    if (service === null) return;

    const result = await executeSubmitCommand(input, { session: options.session }, {
      submit: (sessionId, text) => service.submit(sessionId, text),
    });
    interpretCliResult(result);
  });

program
  .command('show <sessionId>')
  .description('Show the stored state of a session')
  .action(async (sessionId: string) => {
    const service = await resolveService();
    if (service === null) return;

    interpretCliResult(await executeShowCommand(sessionId, { inspect: (id) => service.inspect(id) }));
  });

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port to listen on (overrides SAFEPLATES_HTTP_PORT)')
  .action(async (options: { port?: string }) => {
    const service = await resolveService();
    if (service === null) return;

    const config = container.resolve<ValidatedConfig>(DI.Config.App);
    const port = options.port === undefined ? config.http.port : Number(options.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      interpretCliResult(misuse(`Invalid port: ${options.port ?? ''}`, ['Use a port between 1 and 65535']));
      return;
    }

    const server = container.resolve<HttpServer>(DI.Infra.HttpServer);
    const result = await executeServeCommand({ server, port });
    interpretCliResult(result);
    if (result.kind === 'failure') return;

    const shutdown = (): void => {
      server.stop().then(
        () => undefined,
        (error: unknown) => console.error(error)
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
