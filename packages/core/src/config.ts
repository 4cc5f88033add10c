import { z } from "zod";
import { ValidationError } from "tessera-shared";
import type { DiagnosticHandler } from "./diagnostics";

// ============================================================================
// Schema
// ============================================================================

export const engineConfigSchema = z.object({
  /** Engine name, used as `engine_id` in logs */
  name: z.string().min(1).optional(),
  /** Flush rounds allowed before a ReentrantUpdateError */
  maxReentrantRounds: z.number().int().positive().default(10),
  /** Consecutive unvisited renders before an identity is evicted */
  sweepAfterPasses: z.number().int().positive().default(1),
  /** How writes made outside any phase get flushed */
  autoFlush: z.enum(["microtask", "manual"]).default("microtask"),
  /** Commands kept by the undo history (0 disables it) */
  historyLimit: z.number().int().nonnegative().default(100),
  /** Development checks: identity-drift reports and TypeTag guards */
  dev: z.boolean().default(() => process.env.NODE_ENV !== "production"),
});

const envSchema = z.object({
  TESSERA_MAX_REENTRANT_ROUNDS: z.coerce.number().optional(),
  TESSERA_SWEEP_AFTER_PASSES: z.coerce.number().optional(),
  TESSERA_AUTO_FLUSH: z.string().optional(),
  TESSERA_HISTORY_LIMIT: z.coerce.number().optional(),
});

export type EngineConfig = z.output<typeof engineConfigSchema>;

export interface EngineCallbacks {
  /** Recoverable conditions: stale writes, identity drift, effect errors */
  onDiagnostic?: DiagnosticHandler;
  /** Fatal errors thrown by flushes that started from a microtask */
  onError?: (error: Error) => void;
}

export type EngineOptions = z.input<typeof engineConfigSchema> & EngineCallbacks;

// ============================================================================
// Global defaults
// ============================================================================

let globalDefaults: z.input<typeof engineConfigSchema> = {};

/**
 * Configure defaults for every engine created afterwards.
 * Explicit options passed to `createEngine()` still win.
 *
 * @example
 * ```typescript
 * configureEngine({ maxReentrantRounds: 25, autoFlush: 'manual' });
 * ```
 */
export function configureEngine(defaults: z.input<typeof engineConfigSchema>): void {
  globalDefaults = { ...globalDefaults, ...defaults };
}

export function resetEngineDefaults(): void {
  globalDefaults = {};
}

// ============================================================================
// Resolution
// ============================================================================

function toValidationError(error: z.ZodError, source: string): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : source;
  return new ValidationError(
    field,
    `Invalid ${source}: ${field}: ${issue ? issue.message : "invalid value"}`,
    { code: issue?.code === "invalid_type" ? "VALIDATION_TYPE" : "VALIDATION_CONSTRAINT" },
    error,
  );
}

/**
 * Read the TESSERA_* environment fallbacks.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): z.input<typeof engineConfigSchema> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw toValidationError(parsed.error, "environment");
  }

  const vars = parsed.data;
  const config: z.input<typeof engineConfigSchema> = {};
  if (vars.TESSERA_MAX_REENTRANT_ROUNDS !== undefined) {
    config.maxReentrantRounds = vars.TESSERA_MAX_REENTRANT_ROUNDS;
  }
  if (vars.TESSERA_SWEEP_AFTER_PASSES !== undefined) {
    config.sweepAfterPasses = vars.TESSERA_SWEEP_AFTER_PASSES;
  }
  if (vars.TESSERA_AUTO_FLUSH === "microtask" || vars.TESSERA_AUTO_FLUSH === "manual") {
    config.autoFlush = vars.TESSERA_AUTO_FLUSH;
  } else if (vars.TESSERA_AUTO_FLUSH !== undefined) {
    throw ValidationError.type("TESSERA_AUTO_FLUSH", "'microtask' | 'manual'", vars.TESSERA_AUTO_FLUSH);
  }
  if (vars.TESSERA_HISTORY_LIMIT !== undefined) {
    config.historyLimit = vars.TESSERA_HISTORY_LIMIT;
  }
  return config;
}

/**
 * Merge defaults, environment and explicit options (in that order) and validate.
 *
 * @throws ValidationError on the first invalid value
 */
export function resolveEngineConfig(
  options: EngineOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const { onDiagnostic: _onDiagnostic, onError: _onError, ...explicit } = options;
  const defined = Object.fromEntries(
    Object.entries(explicit).filter(([, value]) => value !== undefined),
  );
  const merged = { ...globalDefaults, ...configFromEnv(env), ...defined };

  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw toValidationError(parsed.error, "engine config");
  }
  return parsed.data;
}
