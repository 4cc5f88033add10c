/**
 * Atoms are reactive value cells. Reading an atom inside a recording scope
 * subscribes that scope; writing it notifies every subscriber when the value
 * changed.
 *
 * Change policy: primitives (string, number, boolean, bigint, symbol, null,
 * undefined) compare with `Object.is`. Objects and functions have no defined
 * equality and always count as changed, unless the atom has its own `equals`.
 */

import type { IdentityKey } from "../identity/call-identity";
import type { SubscriberKey, Trackable } from "../tracking/dependency-tracker";
import type { HistoryCommand } from "./history";

// ============================================================================
// Types
// ============================================================================

export const ATOM_SYMBOL = Symbol.for("tessera.atom");

type EqualityFn<T> = (a: T, b: T) => boolean;

export type AtomScope =
  | { readonly kind: "global" }
  | { readonly kind: "scoped"; readonly owner: IdentityKey };

export interface AtomOptions<T> {
  /** Debug name, also used as the key of named atoms */
  name?: string;
  /** Custom equality. Default: `Object.is` for primitives, always changed otherwise */
  equals?: EqualityFn<T>;
  /** Record writes in the engine's History */
  reversible?: boolean;
  /** Identity whose eviction disposes the atom */
  owner?: IdentityKey;
}

/**
 * A reusable, globally keyed atom. `registry.named(definition)` creates the
 * atom on first use and returns the same one afterwards.
 *
 * @example
 * ```typescript
 * export const themeAtom = defineAtom('theme', () => 'light');
 *
 * function Toolbar() {
 *   const theme = useNamedAtom(themeAtom);
 *   return theme.get();
 * }
 * ```
 */
export interface AtomDefinition<T> {
  readonly name: string;
  readonly init: () => T;
  readonly options: Omit<AtomOptions<T>, "name" | "owner">;
}

export function defineAtom<T>(
  name: string,
  init: () => T,
  options: Omit<AtomOptions<T>, "name" | "owner"> = {},
): AtomDefinition<T> {
  return Object.freeze({ name, init, options });
}

/**
 * Type-erased view of an atom, as held by the registry and the tracker.
 */
export interface AtomEntry extends Trackable {
  readonly [ATOM_SYMBOL]: true;
  readonly label: string;
  readonly scope: AtomScope;
  readonly reversible: boolean;
  readonly exists: boolean;
  /** Current value without tracking */
  snapshot(): unknown;
  remove(): void;
}

/**
 * Services an atom needs from its registry.
 */
export interface AtomHost {
  track(atom: AtomEntry): void;
  notify(atom: AtomEntry, silent?: SubscriberKey): void;
  record(command: HistoryCommand): void;
  stale(atom: AtomEntry, operation: string): void;
  release(atom: AtomEntry): void;
}

export function isPrimitive(value: unknown): boolean {
  return value === null || (typeof value !== "object" && typeof value !== "function");
}

export function defaultEquals(a: unknown, b: unknown): boolean {
  return isPrimitive(a) && isPrimitive(b) && Object.is(a, b);
}

// ============================================================================
// Atom
// ============================================================================

export class Atom<T> implements AtomEntry {
  readonly [ATOM_SYMBOL] = true as const;
  readonly subscribers = new Set<SubscriberKey>();
  readonly name: string | undefined;
  readonly scope: AtomScope;
  readonly reversible: boolean;

  private value: T;
  private disposed = false;
  private readonly equals: EqualityFn<T>;

  constructor(
    private readonly host: AtomHost,
    readonly id: number,
    private readonly init: () => T,
    options: AtomOptions<T> = {},
    readonly definition?: AtomDefinition<T>,
  ) {
    this.name = options.name;
    this.scope = options.owner !== undefined ? { kind: "scoped", owner: options.owner } : { kind: "global" };
    this.reversible = options.reversible ?? false;
    this.equals = options.equals ?? defaultEquals;
    this.value = init();
  }

  get label(): string {
    return this.name ?? `atom#${this.id}`;
  }

  get exists(): boolean {
    return !this.disposed;
  }

  /**
   * Read the value, subscribing the current recording scope.
   */
  get(): T {
    if (!this.disposed) {
      this.host.track(this);
    }
    return this.value;
  }

  /**
   * Read the value without subscribing.
   */
  peek(): T {
    return this.value;
  }

  snapshot(): unknown {
    return this.value;
  }

  /**
   * Replace the value and notify subscribers if it changed.
   * Writing a removed atom is dropped and reported.
   */
  set(next: T): void {
    this.write(next, "set");
  }

  /**
   * Like `set()`, but `silent` is left out of the notification. For writes made
   * on behalf of a subscriber that reads the new value right after.
   */
  setExcept(next: T, silent: SubscriberKey): void {
    this.write(next, "set", silent);
  }

  update(fn: (previous: T) => T): void {
    if (this.disposed) {
      this.host.stale(this, "update");
      return;
    }
    this.set(fn(this.value));
  }

  /**
   * Mutate the value in place. Always notifies, since in-place changes cannot be compared.
   * Reversible atoms snapshot the value with `structuredClone` before and after.
   */
  mutate(fn: (draft: T) => void): void {
    if (this.disposed) {
      this.host.stale(this, "mutate");
      return;
    }

    const before = this.reversible ? structuredClone(this.value) : this.value;
    fn(this.value);
    if (this.reversible) {
      this.recordWrite(before, structuredClone(this.value), true);
    }
    this.host.notify(this);
  }

  /**
   * Replace the value without notifying anyone.
   */
  inertSet(next: T): void {
    if (this.disposed) {
      this.host.stale(this, "inertSet");
      return;
    }

    this.recordWrite(this.value, next, false);
    this.value = next;
  }

  /**
   * Re-run the initializer and write its result.
   */
  reset(): void {
    if (this.disposed) {
      this.host.stale(this, "reset");
      return;
    }
    this.set(this.init());
  }

  /**
   * Dispose the atom. Outstanding handles keep their last value; writes are dropped.
   */
  remove(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.host.release(this);
  }

  private write(next: T, operation: string, silent?: SubscriberKey): void {
    if (this.disposed) {
      this.host.stale(this, operation);
      return;
    }

    const previous = this.value;
    if (this.equals(previous, next)) return;

    this.recordWrite(previous, next, true);
    this.value = next;
    this.host.notify(this, silent);
  }

  private recordWrite(previous: T, next: T, notify: boolean): void {
    if (!this.reversible) return;
    this.host.record({
      label: this.label,
      redo: () => this.apply(next, notify),
      undo: () => this.apply(previous, notify),
    });
  }

  private apply(value: T, notify: boolean): void {
    if (this.disposed) {
      this.host.stale(this, "history");
      return;
    }
    this.value = value;
    if (notify) {
      this.host.notify(this);
    }
  }
}

export function isAtom(value: unknown): value is AtomEntry {
  return typeof value === "object" && value !== null && ATOM_SYMBOL in value;
}
