/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives (prove parsing happened)
// =============================================================================

export type DataDirPath = Brand<string, 'DataDirPath'>;
export type DurationMs = Brand<number, 'DurationMs'>;
export type HttpPort = Brand<number, 'HttpPort'>;

export type CheckpointStoreMode =
  | { readonly kind: 'file'; readonly dataDir: DataDirPath }
  | { readonly kind: 'memory'; readonly ttlMs: DurationMs | null };

export interface AppConfig {
  readonly checkpoints: CheckpointStoreMode;
  readonly locking: { readonly waitMs: DurationMs };
  readonly generation: {
    readonly model: string;
    readonly timeoutMs: DurationMs;
    readonly concernCategories: readonly string[];
    readonly apiKey: string | null;
    readonly baseURL: string | null;
  };
  readonly http: { readonly port: HttpPort };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Used for the default data directory; injected so tests never touch the real home. */
  readonly homeDir?: string;
}

export const DEFAULT_CONCERN_CATEGORIES: readonly string[] = ['nuts', 'dairy', 'gluten', 'shellfish', 'eggs'];

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const numberFromEnv = (inner: z.ZodNumber) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(inner.optional());

const EnvSchema = z.object({
  SAFEPLATES_CHECKPOINT_STORE: z.enum(['file', 'memory']).default('file'),
  SAFEPLATES_DATA_DIR: z.string().min(1).optional(),
  SAFEPLATES_CHECKPOINT_TTL_MS: numberFromEnv(z.number().int().min(1, 'SAFEPLATES_CHECKPOINT_TTL_MS must be positive')),
  SAFEPLATES_LOCK_WAIT_MS: numberFromEnv(
    z.number().int().min(0, 'SAFEPLATES_LOCK_WAIT_MS cannot be negative').max(600_000, 'SAFEPLATES_LOCK_WAIT_MS cannot exceed 10 minutes')
  ),
  SAFEPLATES_MODEL: z.string().min(1).default('gpt-4'),
  SAFEPLATES_GENERATION_TIMEOUT_MS: numberFromEnv(
    z.number().int().min(1, 'SAFEPLATES_GENERATION_TIMEOUT_MS must be positive')
  ),
  SAFEPLATES_CONCERN_CATEGORIES: z.string().optional(),
  SAFEPLATES_HTTP_PORT: numberFromEnv(z.number().int().min(1, 'Port must be >= 1').max(65535, 'Port must be <= 65535')),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  const categories = parseCategories(parsed.data.SAFEPLATES_CONCERN_CATEGORIES);
  if (categories.length === 0) {
    return err(
      Err.configInvalid([
        { path: 'SAFEPLATES_CONCERN_CATEGORIES', message: 'At least one concern category is required' },
      ])
    );
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, categories, options.homeDir ?? os.homedir())));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function parseCategories(raw: string | undefined): readonly string[] {
  if (raw === undefined) return DEFAULT_CONCERN_CATEGORIES;
  return raw
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

function buildConfig(env: ParsedEnv, concernCategories: readonly string[], homeDir: string): AppConfig {
  const checkpoints: CheckpointStoreMode =
    env.SAFEPLATES_CHECKPOINT_STORE === 'memory'
      ? { kind: 'memory', ttlMs: (env.SAFEPLATES_CHECKPOINT_TTL_MS ?? null) as DurationMs | null }
      : {
          kind: 'file',
          dataDir: (env.SAFEPLATES_DATA_DIR ?? path.join(homeDir, '.safeplates', 'data')) as DataDirPath,
        };

  return {
    checkpoints,
    locking: { waitMs: (env.SAFEPLATES_LOCK_WAIT_MS ?? 30_000) as DurationMs },
    generation: {
      model: env.SAFEPLATES_MODEL,
      timeoutMs: (env.SAFEPLATES_GENERATION_TIMEOUT_MS ?? 60_000) as DurationMs,
      concernCategories,
      apiKey: env.OPENAI_API_KEY ?? null,
      baseURL: env.OPENAI_BASE_URL ?? null,
    },
    http: { port: (env.SAFEPLATES_HTTP_PORT ?? 3456) as HttpPort },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
