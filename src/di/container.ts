import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import { loadRecipeGraph, type RecipeGraph } from '../domain/workflow/recipe-graph.js';
import { createRecipeSteps, type StepRegistry } from '../domain/workflow/steps.js';
import type { NodeId } from '../domain/workflow/ids.js';
import type { WorkflowState } from '../domain/workflow/state.js';
import type { CheckpointStorePort } from '../ports/checkpoint-store.port.js';
import type { IdFactoryPort } from '../ports/id-factory.port.js';
import type { SessionLockPort } from '../ports/session-lock.port.js';
import type { TextGenerationPort } from '../ports/text-generation.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ExecutionSessionGate } from '../usecases/execution-session-gate.js';
import type { WorkflowEngine } from '../usecases/workflow-engine.js';
import type { RecipeSessionService } from '../application/services/recipe-session-service.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializing: Promise<Result<void, AppError>> | null = null;

export interface ContainerInitOptions {
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

/**
 * Registers a singleton factory unless the token is already bound.
 * Tests bind config, generation or the store up front; those bindings win.
 */
function registerOnce<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, AppError> {
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// PORT REGISTRATION
// Level 1: primitives. Level 2: stores, lock and generation (need config).
// ═══════════════════════════════════════════════════════════════════════════

async function registerPorts(): Promise<void> {
  const { NodeTimeClock } = await import('../infra/local/time-clock/index.js');
  const { RandomIdFactory } = await import('../infra/local/id-factory/index.js');
  const { LocalDataDir } = await import('../infra/local/data-dir/index.js');
  const { LocalCheckpointStore } = await import('../infra/local/checkpoint-store/index.js');
  const { InMemoryCheckpointStore } = await import('../infra/in-memory/checkpoint-store/index.js');
  const { InProcessSessionLock } = await import('../infra/local/session-lock/index.js');
  const { OpenAITextGeneration } = await import('../infra/openai/text-generation/index.js');
  const { UnconfiguredTextGeneration } = await import('../infra/unconfigured/text-generation/index.js');

  registerOnce<ILoggerFactory>(DI.Logging.Factory, (c) => c.resolve(PinoLoggerFactory));
  registerOnce<TimeClockPort>(DI.Ports.TimeClock, () => new NodeTimeClock());
  registerOnce<IdFactoryPort>(DI.Ports.IdFactory, () => new RandomIdFactory());

  registerOnce<CheckpointStorePort>(DI.Ports.CheckpointStore, (c) => {
    const { checkpoints } = c.resolve<ValidatedConfig>(DI.Config.App);
    switch (checkpoints.kind) {
      case 'file':
        return new LocalCheckpointStore(new LocalDataDir(checkpoints.dataDir));
      case 'memory':
        return new InMemoryCheckpointStore({
          ttlMs: checkpoints.ttlMs,
          clock: c.resolve<TimeClockPort>(DI.Ports.TimeClock),
        });
      default:
        return assertNever(checkpoints);
    }
  });

  registerOnce<SessionLockPort>(DI.Ports.SessionLock, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new InProcessSessionLock({ waitMs: config.locking.waitMs });
  });

  registerOnce<TextGenerationPort>(DI.Ports.TextGeneration, (c) => {
    const { generation } = c.resolve<ValidatedConfig>(DI.Config.App);
    if (generation.apiKey === null) return new UnconfiguredTextGeneration();
    return new OpenAITextGeneration(
      {
        apiKey: generation.apiKey,
        baseURL: generation.baseURL,
        model: generation.model,
        timeoutMs: generation.timeoutMs,
      },
      c.resolve<ILoggerFactory>(DI.Logging.Factory).create('OpenAITextGeneration')
    );
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// WORKFLOW REGISTRATION
// Level 3: graph + steps. Level 4: gate + engine. Level 5: service + HTTP.
// ═══════════════════════════════════════════════════════════════════════════

async function registerWorkflow(): Promise<Result<void, AppError>> {
  if (!container.isRegistered(DI.Workflow.Graph)) {
    const graph = loadRecipeGraph();
    if (graph.isErr()) {
      return err(Err.startupFailed('workflow graph', graph.error.message, graph.error.issues));
    }
    container.register<RecipeGraph>(DI.Workflow.Graph, { useValue: graph.value });
  }

  const { ExecutionSessionGate } = await import('../usecases/execution-session-gate.js');
  const { WorkflowEngine } = await import('../usecases/workflow-engine.js');
  const { RecipeSessionService } = await import('../application/services/recipe-session-service.js');
  const { HttpServer } = await import('../infrastructure/http/HttpServer.js');

  const loggers = (c: DependencyContainer) => c.resolve<ILoggerFactory>(DI.Logging.Factory);

  registerOnce<StepRegistry<WorkflowState, NodeId>>(DI.Workflow.Steps, (c) =>
    createRecipeSteps({
      generation: c.resolve<TextGenerationPort>(DI.Ports.TextGeneration),
      concernCategories: c.resolve<ValidatedConfig>(DI.Config.App).generation.concernCategories,
    })
  );

  registerOnce<ExecutionSessionGate>(DI.Workflow.ExecutionGate, (c) =>
    new ExecutionSessionGate(c.resolve<SessionLockPort>(DI.Ports.SessionLock), loggers(c).create('ExecutionSessionGate'))
  );

  registerOnce<WorkflowEngine>(DI.Workflow.Engine, (c) =>
    new WorkflowEngine({
      graph: c.resolve<RecipeGraph>(DI.Workflow.Graph),
      steps: c.resolve<StepRegistry<WorkflowState, NodeId>>(DI.Workflow.Steps),
      store: c.resolve<CheckpointStorePort>(DI.Ports.CheckpointStore),
      gate: c.resolve<ExecutionSessionGate>(DI.Workflow.ExecutionGate),
      clock: c.resolve<TimeClockPort>(DI.Ports.TimeClock),
      logger: loggers(c).create('WorkflowEngine'),
    })
  );

  registerOnce<RecipeSessionService>(DI.Services.RecipeSession, (c) =>
    new RecipeSessionService(
      c.resolve<WorkflowEngine>(DI.Workflow.Engine),
      c.resolve<IdFactoryPort>(DI.Ports.IdFactory),
      loggers(c).create('RecipeSessionService')
    )
  );

  registerOnce(DI.Infra.HttpServer, (c) =>
    new HttpServer(c.resolve<RecipeSessionService>(DI.Services.RecipeSession), loggers(c).create('HttpServer'))
  );

  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

async function doInitialize(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  try {
    const configured = registerConfig(options.env ?? process.env);
    if (configured.isErr()) return configured;

    await registerPorts();
    const workflow = await registerWorkflow();
    if (workflow.isErr()) return workflow;

    initialized = true;
    container.resolve<ILoggerFactory>(DI.Logging.Factory).root.debug('DI container initialized');
    return ok(undefined);
  } catch (e) {
    return err(Err.unexpected('Container initialization failed', e));
  }
}

/**
 * Initialize the DI container.
 *
 * Idempotent: calls after success return immediately.
 * Concurrent calls share one initialization.
 * Failures (bad config, invalid graph) are returned, never thrown; the
 * container stays uninitialized so a caller can fix the env and retry.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initialized) return ok(undefined);
  if (initializing !== null) return initializing;

  const pending = doInitialize(options);
  initializing = pending;
  try {
    return await pending;
  } finally {
    initializing = null;
  }
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializing = null;
}

export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access at composition roots
export { container };
