/**
 * Hooks
 *
 * Stateful functions for render callbacks. Every hook takes the next
 * call-identity of the rendering component and keeps its state in the
 * engine's store, so values persist across renders without keys.
 *
 * Rules of Hooks:
 * 1. Only call hooks while an engine renders (inside `runPass()` or `component()`)
 * 2. Call hooks in the same order every render; wrap conditional groups in `nested()`
 * 3. The same call-site must always call the same hook
 */

import { formatIdentity, identityKey } from "../identity/call-identity";
import type { Atom, AtomDefinition, AtomOptions } from "../atoms/atom";
import type { Reaction } from "../atoms/reaction";
import type { EffectCallback } from "../engine/types";
import type { HookEngine } from "../engine/engine";
import { getCurrentEngine } from "./render-context";

export type Dispatch<A> = (action: A) => void;

export type SetStateAction<S> = S | ((previous: S) => S);

export interface RefObject<T> {
  current: T;
}

// ============================================================================
// Helpers
// ============================================================================

function isInitializer<S>(value: S | (() => S)): value is () => S {
  return typeof value === "function";
}

function toInitializer<T>(value: T | (() => T)): () => T {
  if (isInitializer(value)) return value;
  const resolved: T = value;
  return () => resolved;
}

function isUpdater<S>(action: SetStateAction<S>): action is (previous: S) => S {
  return typeof action === "function";
}

function basicStateReducer<S>(state: S, action: SetStateAction<S>): S {
  return isUpdater(action) ? action(state) : action;
}

/**
 * Tag kind of a `useState` initial value. Function initializers share one
 * kind since their result type is only known after the first call.
 */
function stateKind(initial: unknown): string {
  if (initial === null) return "null";
  if (Array.isArray(initial)) return "array";
  if (typeof initial === "function") return "lazy";
  return typeof initial;
}

export function areHookInputsEqual(
  nextDeps: readonly unknown[],
  prevDeps: readonly unknown[] | undefined,
): boolean {
  if (prevDeps === undefined || nextDeps.length !== prevDeps.length) return false;

  for (let i = 0; i < nextDeps.length; i++) {
    if (!Object.is(nextDeps[i], prevDeps[i])) return false;
  }
  return true;
}

// ============================================================================
// STRUCTURE
// ============================================================================

/**
 * Engine currently rendering.
 */
export function useEngine(): HookEngine {
  return getCurrentEngine("useEngine");
}

/**
 * Run `fn` one nesting level deeper. Hooks after a `nested()` call keep their
 * identities however many hooks `fn` calls.
 *
 * @example
 * ```typescript
 * nested(() => {
 *   if (expanded) useState('details');
 * });
 * const [count] = useState(0); // same identity whether expanded or not
 * ```
 */
export function nested<R>(fn: () => R): R {
  return getCurrentEngine("nested").nested(fn);
}

/**
 * Render a child component. It re-renders on its own when an atom it read
 * changes, and is unmounted (cleanups run) when its call-site disappears.
 *
 * @example
 * ```typescript
 * const Counter = (label: string) => component(() => {
 *   const [count, setCount] = useState(0);
 *   return `${label}: ${count}`;
 * });
 * ```
 */
export function component<R>(render: () => R): R {
  return getCurrentEngine("component").component(render);
}

// ============================================================================
// STATE HOOKS
// ============================================================================

interface ReducerSlot<S, A> {
  state: S;
  reducer: (state: S, action: A) => S;
  dispatch: Dispatch<A> | null;
}

function useReducerSlot<S, A>(
  hook: string,
  tag: string,
  reducer: (state: S, action: A) => S,
  initialize: () => S,
): [S, Dispatch<A>] {
  const engine = getCurrentEngine(hook);
  const cell = engine.getOrInit<ReducerSlot<S, A>>(tag, () => ({
    state: initialize(),
    reducer,
    dispatch: null,
  }));
  const slot = cell.get();
  slot.reducer = reducer;

  if (slot.dispatch === null) {
    const owner = engine.currentComponentKey();
    slot.dispatch = (action) => {
      if (cell.disposed) {
        engine.reportStale(`${hook}@${formatIdentity(cell.key)}`);
        return;
      }
      const next = slot.reducer(slot.state, action);
      if (Object.is(next, slot.state)) return; // Bailout
      slot.state = next;
      engine.requestRender(owner);
    };
  }

  return [slot.state, slot.dispatch];
}

/**
 * useState - Local state of a call-site.
 *
 * The setter re-renders the owning component unless the new state is
 * `Object.is`-equal to the current one. Setting state of an evicted
 * call-site is ignored and reported as a `stale-handle-write` diagnostic.
 *
 * @example
 * ```typescript
 * const [count, setCount] = useState(0);
 * setCount((c) => c + 1);
 * ```
 */
export function useState<S>(initialState: S | (() => S)): [S, Dispatch<SetStateAction<S>>] {
  return useReducerSlot<S, SetStateAction<S>>(
    "useState",
    `state:${stateKind(initialState)}`,
    basicStateReducer,
    toInitializer(initialState),
  );
}

/**
 * useReducer - State with reducer pattern.
 */
export function useReducer<S, A>(
  reducer: (state: S, action: A) => S,
  initialArg: S,
  init?: (arg: S) => S,
): [S, Dispatch<A>] {
  return useReducerSlot("useReducer", "reducer", reducer, () =>
    init ? init(initialArg) : initialArg,
  );
}

/**
 * useRef - Mutable box that persists across renders. Writing it never re-renders.
 */
export function useRef<T>(initialValue: T): RefObject<T> {
  return getCurrentEngine("useRef")
    .getOrInit<RefObject<T>>("ref", () => ({ current: initialValue }))
    .get();
}

// ============================================================================
// MEMOIZATION HOOKS
// ============================================================================

interface MemoSlot<T> {
  value: T;
  deps: readonly unknown[];
}

/**
 * useMemo - Memoize a computation until one of `deps` changes (`Object.is`).
 */
export function useMemo<T>(factory: () => T, deps: readonly unknown[]): T {
  const slot = getCurrentEngine("useMemo")
    .getOrInit<MemoSlot<T>>("memo", () => ({ value: factory(), deps }))
    .get();

  if (!areHookInputsEqual(deps, slot.deps)) {
    slot.value = factory();
    slot.deps = deps;
  }
  return slot.value;
}

/**
 * useCallback - Keep the same function identity until one of `deps` changes.
 */
export function useCallback<T extends (...args: never[]) => unknown>(
  callback: T,
  deps: readonly unknown[],
): T {
  const slot = getCurrentEngine("useCallback")
    .getOrInit<MemoSlot<T>>("callback", () => ({ value: callback, deps }))
    .get();

  if (!areHookInputsEqual(deps, slot.deps)) {
    slot.value = callback;
    slot.deps = deps;
  }
  return slot.value;
}

// ============================================================================
// EFFECT HOOKS
// ============================================================================

interface EffectSlot {
  scheduled: boolean;
  deps: readonly unknown[] | undefined;
}

/**
 * useEffect - Side effect run after the render unit completes.
 *
 * Without `deps` it runs after every render; with `deps` only when one of
 * them changed. The previous cleanup runs before each re-run and when the
 * call-site is evicted.
 *
 * @example
 * ```typescript
 * useEffect(() => {
 *   const timer = setInterval(tick, 1000);
 *   return () => clearInterval(timer);
 * }, []);
 * ```
 */
export function useEffect(create: EffectCallback, deps?: readonly unknown[]): void {
  const engine = getCurrentEngine("useEffect");
  const cell = engine.getOrInit<EffectSlot>("effect", () => ({ scheduled: false, deps: undefined }));
  const slot = cell.get();

  const hasDepsChanged =
    !slot.scheduled || deps === undefined || !areHookInputsEqual(deps, slot.deps);

  if (hasDepsChanged) {
    slot.scheduled = true;
    slot.deps = deps;
    engine.scheduleEffect(cell.key, create);
  }
}

interface UnmountSlot {
  callback: () => void;
}

/**
 * useOnUnmount - Run `callback` when the call-site is evicted or the engine
 * is disposed. The latest callback passed is the one that runs.
 */
export function useOnUnmount(callback: () => void): void {
  const engine = getCurrentEngine("useOnUnmount");
  const slot = engine
    .getOrInit<UnmountSlot>("unmount", (identity) => {
      const created: UnmountSlot = { callback };
      engine.registerEffect(identity, () => created.callback());
      return created;
    })
    .get();
  slot.callback = callback;
}

/**
 * doOnce - Run `fn` during the first render of the call-site only.
 *
 * @returns true on the render that ran `fn`
 */
export function doOnce(fn: () => void): boolean {
  const slot = getCurrentEngine("doOnce")
    .getOrInit<{ done: boolean }>("once", () => ({ done: false }))
    .get();

  if (slot.done) return false;
  slot.done = true;
  fn();
  return true;
}

// ============================================================================
// ATOM HOOKS
// ============================================================================

/**
 * useAtom - Atom scoped to the call-site. Created on first render, disposed
 * when the call-site is evicted. Components that `get()` it re-render on writes.
 *
 * @example
 * ```typescript
 * const todos = useAtom<string[]>([]);
 * const Count = () => component(() => todos.get().length);
 * ```
 */
export function useAtom<T>(
  initial: T | (() => T),
  options: Omit<AtomOptions<T>, "owner"> = {},
): Atom<T> {
  const engine = getCurrentEngine("useAtom");
  return engine
    .getOrInit<Atom<T>>("atom", (identity) =>
      engine.atoms.createWith(toInitializer(initial), {
        ...options,
        owner: identityKey(identity),
      }),
    )
    .get();
}

/**
 * useNamedAtom - Engine-wide atom shared by every call-site using the same definition.
 */
export function useNamedAtom<T>(definition: AtomDefinition<T>): Atom<T> {
  return getCurrentEngine("useNamedAtom").atoms.named(definition);
}

interface ComputedSlot<T> {
  reaction: Reaction<T>;
  deps: readonly unknown[] | undefined;
}

/**
 * useComputed - Derived value scoped to the call-site.
 *
 * Recomputes when an atom it read changes; with `deps`, also when one of
 * them changed since the previous render. The component re-renders when
 * the derived value changes, except for a recomputation its own render
 * caused. A computation that throws makes this hook throw.
 *
 * @example
 * ```typescript
 * const done = useComputed(() => todos.get().filter((t) => t.done).length);
 * ```
 */
export function useComputed<T>(compute: () => T, deps?: readonly unknown[]): T {
  const engine = getCurrentEngine("useComputed");
  const slot = engine
    .getOrInit<ComputedSlot<T>>("computed", (identity) => ({
      reaction: engine.reaction(compute, { owner: identityKey(identity) }),
      deps,
    }))
    .get();

  slot.reaction.setCompute(compute);
  if (deps !== undefined && !areHookInputsEqual(deps, slot.deps)) {
    slot.deps = deps;
    // The rendering component reads the new value below
    slot.reaction.recompute({ silentFor: engine.currentComponentKey() });
  }
  return slot.reaction.get();
}

// ============================================================================
// CHANGE HOOKS
// ============================================================================

/**
 * usePrevious - Value passed on the previous render.
 */
export function usePrevious<T>(value: T): T | undefined {
  const ref = useRef<T | undefined>(undefined);
  const previous = ref.current;
  ref.current = value;
  return previous;
}

interface ObservedSlot<T> {
  previous: T | undefined;
  current: T;
}

/**
 * useObserveChange - The last change of `value` as a `[previous, current]`
 * pair. `previous` stays at the value before the most recent change until
 * `value` changes again.
 */
export function useObserveChange<T>(value: T): [previous: T | undefined, current: T] {
  const slot = getCurrentEngine("useObserveChange")
    .getOrInit<ObservedSlot<T>>("observe", () => ({ previous: undefined, current: value }))
    .get();

  if (!Object.is(slot.current, value)) {
    slot.previous = slot.current;
    slot.current = value;
  }
  return [slot.previous, slot.current];
}

/**
 * useHasChanged - Whether `value` differs (`Object.is`) from the previous
 * render. False on the first render.
 */
export function useHasChanged<T>(value: T): boolean {
  const slot = getCurrentEngine("useHasChanged")
    .getOrInit<{ value: T }>("changed", () => ({ value }))
    .get();

  const changed = !Object.is(slot.value, value);
  slot.value = value;
  return changed;
}
