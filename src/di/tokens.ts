/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register a factory in container.ts (dependencies before dependents)
 * 3. Resolve with container.resolve<T>(DI.X.Y) at composition roots only
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PORTS (adapters chosen from config)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    TimeClock: Symbol('Ports.TimeClock'),
    IdFactory: Symbol('Ports.IdFactory'),
    CheckpointStore: Symbol('Ports.CheckpointStore'),
    SessionLock: Symbol('Ports.SessionLock'),
    /** Tests may register a scripted generator before initialization. */
    TextGeneration: Symbol('Ports.TextGeneration'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // WORKFLOW
  // ═══════════════════════════════════════════════════════════════════
  Workflow: {
    /** Validated recipe graph (shared, read-only) */
    Graph: Symbol('Workflow.Graph'),
    Steps: Symbol('Workflow.Steps'),
    ExecutionGate: Symbol('Workflow.ExecutionGate'),
    Engine: Symbol('Workflow.Engine'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES & INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    RecipeSession: Symbol('Services.RecipeSession'),
  },
  Infra: {
    /** JSON API server */
    HttpServer: Symbol('Infra.HttpServer'),
  },
} as const;
