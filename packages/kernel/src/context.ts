import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "tessera-shared";

/**
 * Phase an engine is in when something is logged.
 */
export type EnginePhase = "idle" | "render" | "effects" | "flush" | "sweep";

export interface ContextMetadata extends Record<string, unknown> {}

/**
 * Ambient context for everything a HookEngine does.
 * The engine runs each pass, replay and flush inside `Context.run()` so the
 * logger can stamp every entry with the engine and the pass it belongs to.
 *
 * @example
 * ```typescript
 * interface DevtoolsContext extends KernelContext {
 *   sessionId: string;
 * }
 * ```
 */
export interface KernelContext {
  /** Name or id of the engine instance */
  engineId: string;
  traceId: string;
  /** Number of the current pass (0 before the first one) */
  pass: number;
  phase: EnginePhase;
  /** Dotted identity of the component being rendered, if any */
  component?: string;
  metadata: ContextMetadata;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      engineId: overrides.engineId ?? randomUUID(),
      traceId: overrides.traceId ?? randomUUID(),
      pass: overrides.pass ?? 0,
      phase: overrides.phase ?? "idle",
      component: overrides.component,
      metadata: overrides.metadata ?? {},
    };
  }

  /**
   * Runs a function within the given context.
   * Works for synchronous and async functions alike; the return value is passed through.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * The child is a shallow copy, so `metadata` is shared with the parent.
   *
   * @example
   * ```typescript
   * const renderCtx = Context.child({ phase: 'render', component: '0.1' });
   * Context.run(renderCtx, () => render());
   * ```
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
    };
  }

  /**
   * Creates a child context and runs a function within it.
   * Convenience method combining `child()` and `run()`.
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }
}
