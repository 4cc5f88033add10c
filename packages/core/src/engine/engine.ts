/**
 * Hook Engine
 *
 * Ties the pieces together: every hook call asks the identity allocator for
 * its call-identity, keeps its value in the state store, subscribes the
 * rendering component to the atoms it reads and registers cleanups with the
 * effect registry. After a component renders, the sweeper reconciles what it
 * owns with what it visited; writes enqueue components with the scheduler,
 * which replays them from their last render closure.
 *
 * @example
 * ```typescript
 * const engine = createEngine({ name: 'todo' });
 * const todos = engine.atoms.create<string[]>([]);
 *
 * const App = () => {
 *   const [filter, setFilter] = useState('all');
 *   return component(() => todos.get().length);
 * };
 *
 * engine.runPass(App);
 * todos.update((list) => [...list, 'write docs']);
 * await Promise.resolve(); // microtask flush re-renders the child only
 * ```
 */

import {
  ContextError,
  StaleHandleError,
  StateError,
  ensureError,
  isFatalError,
} from "tessera-shared";
import { Context, Logger, type KernelContext } from "tessera-kernel";
import {
  ROOT_KEY,
  formatIdentity,
  identityKey,
  type CallIdentity,
  type IdentityKey,
} from "../identity/call-identity";
import { IdentityAllocator } from "../identity/allocator";
import { StateStore, type StateCell, type TypeTag } from "../store/state-store";
import { DependencyTracker, type SubscriberTarget } from "../tracking/dependency-tracker";
import { AtomRegistry } from "../atoms/atom-registry";
import { History } from "../atoms/history";
import { Reaction, type ReactionEntry, type ReactionHost, type ReactionOptions } from "../atoms/reaction";
import { EffectRegistry, type EffectCleanup } from "../lifecycle/effects";
import { LifecycleSweeper, type OwnedKind } from "../lifecycle/sweeper";
import { RenderScheduler, type FlushResult } from "../scheduler/render-scheduler";
import { resolveEngineConfig, type EngineCallbacks, type EngineConfig, type EngineOptions } from "../config";
import type { Diagnostic } from "../diagnostics";
import { setActiveEngine } from "../hooks/render-context";
import type {
  ComponentRecord,
  EffectCallback,
  EngineSnapshot,
  PendingEffect,
  RenderFrame,
} from "./types";

const log = Logger.for("HookEngine");

export class HookEngine {
  private static engineCount = 0;

  readonly id: string;
  readonly config: EngineConfig;
  readonly allocator = new IdentityAllocator();
  readonly tracker = new DependencyTracker();
  readonly store: StateStore;
  readonly effects: EffectRegistry;
  readonly history: History;
  readonly atoms: AtomRegistry;
  readonly scheduler: RenderScheduler;

  private readonly sweeper: LifecycleSweeper;
  private readonly callbacks: EngineCallbacks;
  private readonly context: KernelContext;
  private readonly reactionHost: ReactionHost;
  private readonly components = new Map<IdentityKey, ComponentRecord>();
  private readonly reactions = new Map<number, ReactionEntry>();
  private readonly frames: RenderFrame[] = [];
  private unitEffects: PendingEffect[] | null = null;
  private nextReactionId = 1;
  private passCount = 0;
  private _disposed = false;

  constructor(options: EngineOptions = {}) {
    this.config = resolveEngineConfig(options);
    this.callbacks = { onDiagnostic: options.onDiagnostic, onError: options.onError };
    this.id = this.config.name ?? `engine-${++HookEngine.engineCount}`;
    this.context = Context.create({ engineId: this.id });

    const report = (diagnostic: Diagnostic) => this.report(diagnostic);

    this.store = new StateStore({ validate: this.config.dev });
    this.effects = new EffectRegistry(report);
    this.history = new History({
      limit: this.config.historyLimit,
      apply: (fn) => this.scheduler.batch(fn),
    });
    this.atoms = new AtomRegistry({
      tracker: this.tracker,
      history: this.history,
      notify: (target) => this.notify(target),
      report,
    });
    this.scheduler = new RenderScheduler(
      {
        isLive: (key) => this.components.get(key)?.live === true,
        render: (key) => this.replay(key),
        handleAsyncError: (error) => this.handleAsyncError(error),
      },
      {
        maxReentrantRounds: this.config.maxReentrantRounds,
        autoFlush: this.config.autoFlush,
      },
    );
    this.sweeper = new LifecycleSweeper(
      {
        evictSlot: (key) => this.evictSlot(key),
        unmount: (key) => this.unmount(key),
        suspend: (key, kind) => this.suspend(key, kind),
        report,
      },
      {
        sweepAfterPasses: this.config.sweepAfterPasses,
        detectDrift: this.config.dev,
      },
    );
    this.reactionHost = {
      tracker: this.tracker,
      atoms: this.atoms,
      release: (reaction) => {
        this.reactions.delete(reaction.id);
      },
    };

    log.debug({ engine: this.id, config: this.config }, "Engine created");
  }

  get disposed(): boolean {
    return this._disposed;
  }

  get pass(): number {
    return this.passCount;
  }

  get isRendering(): boolean {
    return this.frames.length > 0;
  }

  // ==========================================================================
  // Passes
  // ==========================================================================

  /**
   * Render the root from the top. State survives between passes; hook
   * identities the root no longer reaches are swept afterwards. Pending
   * re-renders are flushed before this returns.
   *
   * @throws StateError when called while the engine renders or flushes
   */
  runPass<R>(root: () => R): R {
    this.assertActive();
    if (this.isRendering || this.scheduler.state === "flushing") {
      throw new StateError(
        this.isRendering ? "rendering" : "flushing",
        "idle",
        "runPass() cannot be called while the engine is rendering or flushing",
        "STATE_TRANSITION",
      );
    }

    this.passCount += 1;
    return this.inContext({ phase: "render" }, () =>
      this.scheduler.batch(() => {
        const record = this.components.get(ROOT_KEY) ?? this.createRecord([], null);
        return this.renderUnit(record, root);
      }),
    );
  }

  /**
   * Render `render` as a child component: it gets its own identity scope,
   * subscriptions and lifecycle, and re-renders alone when what it read changes.
   */
  component<R>(render: () => R): R {
    const frame = this.requireFrame("component");
    const guard = this.allocator.enterScope();
    try {
      const key = identityKey(guard.path);
      frame.visited.set(key, "component");
      const record = this.components.get(key) ?? this.createRecord(guard.path, frame.record.key);
      return this.renderRecord(record, render);
    } finally {
      guard.release();
    }
  }

  /**
   * Run `fn` in a fresh identity scope of the current component.
   * Hooks inside keep their identities however many hooks precede the call.
   */
  nested<R>(fn: () => R): R {
    this.requireFrame("nested");
    return this.allocator.withScope(() => fn());
  }

  // ==========================================================================
  // Slots
  // ==========================================================================

  /**
   * Take the next call-identity and return its cell, creating it with `init` on first use.
   *
   * @throws ContextError outside a render
   * @throws TypeMismatchError when the identity was last used with another tag
   */
  getOrInit<T>(tag: TypeTag<T> | string, init: (identity: CallIdentity) => T): StateCell<T> {
    const frame = this.requireFrame("getOrInit");
    const identity = this.allocator.nextId();
    frame.visited.set(identityKey(identity), "slot");
    frame.slots += 1;

    const resolved: TypeTag<T> = typeof tag === "string" ? { name: tag } : tag;
    return this.store.getOrInit(identity, resolved, init);
  }

  /**
   * Register a cleanup that runs when the identity is evicted or the engine is disposed.
   */
  registerEffect(identity: CallIdentity | IdentityKey, cleanup: EffectCleanup): () => void {
    const key = typeof identity === "string" ? identity : identityKey(identity);
    return this.effects.register(key, cleanup);
  }

  /**
   * Queue `create` to run after the current render unit. The slot's previous
   * cleanup runs first; the returned function becomes the new one.
   */
  scheduleEffect(key: IdentityKey, create: EffectCallback): void {
    const frame = this.requireFrame("useEffect");
    frame.effects.push({ key, owner: frame.record.key, create });
  }

  currentComponentKey(): IdentityKey {
    return this.requireFrame("currentComponentKey").record.key;
  }

  /**
   * Enqueue a re-render of a component. Returns false when nothing was queued.
   */
  requestRender(componentKey: IdentityKey): boolean {
    if (this._disposed) return false;
    return this.scheduler.enqueue(componentKey);
  }

  /**
   * Report a write through a handle whose state was evicted.
   */
  reportStale(target: string): void {
    const error = new StaleHandleError(target);
    this.report({ kind: "stale-handle-write", message: error.message, target, error });
  }

  // ==========================================================================
  // Reactions
  // ==========================================================================

  /**
   * Create a derived value that recomputes whenever an atom or reaction it read changes.
   * With an `owner`, the reaction is disposed when that identity is evicted.
   */
  reaction<T>(compute: () => T, options: ReactionOptions<T> = {}): Reaction<T> {
    this.assertActive();
    const reaction = new Reaction(this.reactionHost, this.nextReactionId++, compute, options);
    this.reactions.set(reaction.id, reaction);
    if (options.owner !== undefined) {
      this.effects.register(options.owner, () => reaction.dispose());
    }
    return reaction;
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  flush(): FlushResult {
    this.assertActive();
    return this.inContext({ phase: "flush" }, () => this.scheduler.flush());
  }

  /**
   * Group writes: the re-renders they cause run once, when the outermost batch ends.
   */
  batch<T>(fn: () => T): T {
    this.assertActive();
    return this.scheduler.batch(fn);
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * Unmount everything and run every remaining cleanup. Further passes throw.
   */
  dispose(): void {
    if (this._disposed) return;

    this.scheduler.close();
    this.unmount(ROOT_KEY);
    for (const key of [...this.components.keys()]) {
      this.unmount(key);
    }
    for (const reaction of [...this.reactions.values()]) {
      reaction.dispose();
    }
    this.effects.runAll();
    this.atoms.disposeAll();
    this.store.clear();
    this.history.clear();
    this._disposed = true;

    log.debug({ engine: this.id, passes: this.passCount }, "Engine disposed");
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  inspect(): EngineSnapshot {
    return {
      id: this.id,
      pass: this.passCount,
      scheduler: {
        state: this.scheduler.state,
        pending: this.scheduler.pendingKeys.map(formatIdentity),
      },
      cells: this.store.keys().map((key) => ({
        identity: formatIdentity(key),
        tag: this.store.peek(key)?.tag ?? "",
      })),
      atoms: this.atoms.entries().map((atom) => ({
        id: atom.id,
        label: atom.label,
        scope: atom.scope.kind === "global" ? "global" : formatIdentity(atom.scope.owner),
        subscribers: [...atom.subscribers].map(formatIdentity),
        value: atom.snapshot(),
      })),
      components: [...this.components.values()].map((record) => ({
        identity: formatIdentity(record.key),
        parent: record.parentKey === null ? null : formatIdentity(record.parentKey),
        live: record.live,
        renders: record.renders,
        owned: [...record.owned.keys()].map(formatIdentity),
      })),
      reactions: [...this.reactions.values()].map((reaction) => ({
        id: reaction.id,
        label: reaction.label,
        computed: reaction.computed,
        dependencies: this.tracker.dependenciesOf(reaction.key),
        value: reaction.snapshot(),
        error: reaction.failure?.message ?? null,
      })),
      history: { length: this.history.length, cursor: this.history.cursor },
    };
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  private createRecord(identity: CallIdentity, parentKey: IdentityKey | null): ComponentRecord {
    const record: ComponentRecord = {
      key: identityKey(identity),
      identity,
      parentKey,
      invoke: () => undefined,
      live: false,
      renders: 0,
      owned: new Map(),
      slotCount: null,
    };
    this.components.set(record.key, record);
    return record;
  }

  /**
   * Render a component as the top of a unit: identities restart at its
   * path and the effects of the whole subtree run once it is done.
   */
  private renderUnit<R>(record: ComponentRecord, invoke: () => R): R {
    this.allocator.reset(record.identity);
    const effects: PendingEffect[] = [];
    const outer = this.unitEffects;
    this.unitEffects = effects;

    let output: R;
    try {
      output = this.renderRecord(record, invoke);
    } finally {
      this.unitEffects = outer;
    }

    this.runEffects(effects);
    return output;
  }

  private renderRecord<R>(record: ComponentRecord, invoke: () => R): R {
    record.invoke = invoke;
    const frame: RenderFrame = { record, visited: new Map(), slots: 0, effects: [] };
    this.tracker.begin(record.key, { kind: "component", componentKey: record.key });
    this.frames.push(frame);
    const previousEngine = setActiveEngine(this);

    let output: R;
    try {
      output = Context.fork({ phase: "render", component: record.key }, invoke);
    } catch (error) {
      this.tracker.discard(record.key);
      throw error;
    } finally {
      this.frames.pop();
      setActiveEngine(previousEngine);
    }

    this.tracker.end(record.key);
    record.live = true;
    record.renders += 1;
    this.sweeper.sweep(record, frame.visited, frame.slots);
    // Children finish first, so their effects are already queued
    this.unitEffects?.push(...frame.effects);
    return output;
  }

  private replay(key: IdentityKey): void {
    const record = this.components.get(key);
    if (!record) return;
    this.inContext({ phase: "render", component: key }, () => this.renderUnit(record, record.invoke));
  }

  private runEffects(effects: PendingEffect[]): void {
    for (const effect of effects) {
      // Evicted by a later sweep of the same unit
      if (!this.store.has(effect.key)) continue;

      this.effects.runSlot(effect.key);
      try {
        const cleanup = this.inContext({ phase: "effects", component: effect.owner }, effect.create);
        this.effects.replace(effect.key, typeof cleanup === "function" ? cleanup : undefined);
      } catch (thrown) {
        if (isFatalError(thrown)) {
          throw thrown;
        }
        const error = ensureError(thrown);
        const target = formatIdentity(effect.key);
        this.report({
          kind: "effect-error",
          message: `Effect at ${target} threw: ${error.message}`,
          target,
          error,
        });
      }
    }
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  private evictSlot(key: IdentityKey): void {
    this.store.remove(key);
    this.effects.runCleanups(key);
    this.atoms.disposeOwnedBy(key);
    // A component mounted at the same call-site keeps its subscriptions
    if (!this.components.has(key)) {
      this.tracker.drop(key);
    }
  }

  private unmount(componentKey: IdentityKey): void {
    const record = this.components.get(componentKey);
    if (!record) return;

    this.components.delete(componentKey);
    record.live = false;
    for (const [key, entry] of record.owned) {
      if (entry.kind === "component") this.unmount(key);
    }
    for (const [key, entry] of record.owned) {
      if (entry.kind === "slot") this.evictSlot(key);
    }
    record.owned.clear();
    this.tracker.drop(componentKey);
    // Unless a hook slot has taken over the call-site
    if (!this.store.has(componentKey)) {
      this.effects.runCleanups(componentKey);
      this.atoms.disposeOwnedBy(componentKey);
    }

    log.debug({ identity: formatIdentity(componentKey) }, "Component unmounted");
  }

  private suspend(key: IdentityKey, kind: OwnedKind): void {
    if (kind === "slot") {
      this.tracker.drop(key);
      return;
    }
    const record = this.components.get(key);
    if (!record) return;
    record.live = false;
    this.tracker.drop(key);
    for (const [child, entry] of record.owned) {
      if (entry.kind === "component") this.suspend(child, "component");
    }
  }

  private notify(target: SubscriberTarget): void {
    if (target.kind === "component") {
      this.requestRender(target.componentKey);
      return;
    }

    const reaction = this.reactions.get(target.reactionId);
    if (!reaction) return;
    try {
      reaction.recompute();
    } catch (thrown) {
      if (isFatalError(thrown)) {
        throw thrown;
      }
      // Kept on the reaction; its readers get the error when they read it
      const error = ensureError(thrown);
      this.report({
        kind: "reaction-error",
        message: `Reaction '${reaction.label}' threw: ${error.message}`,
        target: reaction.label,
        error,
      });
    }
  }

  // ==========================================================================
  // Errors and diagnostics
  // ==========================================================================

  private report(diagnostic: Diagnostic): void {
    const fields = { kind: diagnostic.kind, target: diagnostic.target, err: diagnostic.error };
    if (diagnostic.kind === "effect-error" || diagnostic.kind === "reaction-error") {
      log.error(fields, diagnostic.message);
    } else {
      log.warn(fields, diagnostic.message);
    }
    this.callbacks.onDiagnostic?.(diagnostic);
  }

  private handleAsyncError(error: unknown): void {
    const err = ensureError(error);
    if (this.callbacks.onError) {
      this.callbacks.onError(err);
      return;
    }
    log.fatal({ err }, "Deferred flush failed");
    throw err;
  }

  private requireFrame(hook: string): RenderFrame {
    this.assertActive();
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw ContextError.outsideRender(hook);
    }
    return frame;
  }

  private assertActive(): void {
    if (this._disposed) {
      throw StateError.disposed("HookEngine");
    }
  }

  private inContext<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run({ ...this.context, pass: this.passCount, ...overrides }, fn);
  }
}

/**
 * Create a hook engine.
 *
 * @example
 * ```typescript
 * const engine = createEngine({ autoFlush: 'manual', maxReentrantRounds: 5 });
 * ```
 */
export function createEngine(options: EngineOptions = {}): HookEngine {
  return new HookEngine(options);
}
