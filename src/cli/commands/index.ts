/**
 * CLI Commands - Public API
 */

export { executeChatCommand, OPENING_QUESTION, type ChatCommandDeps, type ChatCommandOptions, type ChatIo } from './chat.js';
export {
  executeSubmitCommand,
  workflowResultToCliResult,
  type SubmitCommandDeps,
  type SubmitCommandOptions,
} from './submit.js';
export { executeShowCommand, type ShowCommandDeps } from './show.js';
export { executeServeCommand, type ServeCommandDeps, type ApiServer } from './serve.js';
