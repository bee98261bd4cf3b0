// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, createValidatedConfig, DEFAULT_CONCERN_CATEGORIES } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, CheckpointStoreMode } from './config/app-config.js';
export { formatAppError } from './errors/formatter.js';
export type { AppError } from './errors/app-error.js';

// Public API exports
export { RecipeSessionService, toErrorResult } from './application/services/recipe-session-service.js';
export type { WorkflowResult } from './application/services/recipe-session-service.js';
export { WorkflowEngine } from './usecases/workflow-engine.js';
export type { WorkflowOutcome, SessionView, WorkflowEngineDeps } from './usecases/workflow-engine.js';
export { ExecutionSessionGate } from './usecases/execution-session-gate.js';

// Domain
export { validateGraph, nextNode, directEdge, conditionalEdge } from './domain/workflow/graph.js';
export type { GraphTopology, GraphDefinition, Edge } from './domain/workflow/graph.js';
export { loadRecipeGraph, RECIPE_GRAPH_TOPOLOGY } from './domain/workflow/recipe-graph.js';
export type { RecipeGraph } from './domain/workflow/recipe-graph.js';
export { createRecipeSteps } from './domain/workflow/steps.js';
export { isRetryable } from './domain/workflow/errors.js';
export type { WorkflowError, WorkflowErrorKind } from './domain/workflow/errors.js';
export type { WorkflowState } from './domain/workflow/state.js';
export type { Checkpoint, SessionPhase } from './domain/workflow/checkpoint.js';
export { parseSessionId } from './domain/workflow/ids.js';
export type { SessionId, NodeId } from './domain/workflow/ids.js';

// Ports
export type { TextGenerationPort, TextGenerationError, ConcernReport } from './ports/text-generation.port.js';
export type { CheckpointStorePort, CheckpointStoreError } from './ports/checkpoint-store.port.js';
export type { SessionLockPort } from './ports/session-lock.port.js';

// Infrastructure exports
export { InMemoryCheckpointStore } from './infra/in-memory/checkpoint-store/index.js';
export { LocalCheckpointStore } from './infra/local/checkpoint-store/index.js';
export { InProcessSessionLock } from './infra/local/session-lock/index.js';
export { OpenAITextGeneration, parseConcernReply } from './infra/openai/text-generation/index.js';
export { HttpServer } from './infrastructure/http/HttpServer.js';
