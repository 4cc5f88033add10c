/**
 * Reactions are derived atoms. A reaction evaluates its compute function
 * inside its own recording scope (`rx:<id>`), stores the result in a plain
 * atom and recomputes synchronously whenever one of its sources notifies it.
 * A computation that throws leaves the reaction failed: readers are notified
 * and `get()`/`peek()` rethrow the error until a later computation succeeds.
 * Components and other reactions that read a reaction subscribe to that
 * result atom, so changes propagate through chains of reactions before any
 * component renders.
 *
 * @example
 * ```typescript
 * const price = engine.atoms.create(10);
 * const quantity = engine.atoms.create(2);
 * const total = engine.reaction(() => price.get() * quantity.get(), { name: 'total' });
 *
 * quantity.set(3);
 * total.peek(); // 30
 * ```
 */

import { ReactivityError, StateError, ensureError } from "tessera-shared";
import type { IdentityKey } from "../identity/call-identity";
import { reactionKey, type DependencyTracker, type SubscriberKey } from "../tracking/dependency-tracker";
import type { AtomRegistry } from "./atom-registry";
import type { Atom } from "./atom";

export interface ReactionOptions<T> {
  /** Debug name */
  name?: string;
  /** Equality for the result atom (same defaults as atoms) */
  equals?: (a: T, b: T) => boolean;
  /** Identity whose eviction disposes the reaction */
  owner?: IdentityKey;
  /** Defer the first computation until `trigger()` */
  startSuspended?: boolean;
}

export interface RecomputeOptions {
  /** Subscriber left out of the change notification */
  silentFor?: SubscriberKey;
}

/**
 * Type-erased view of a reaction, as held by the engine.
 */
export interface ReactionEntry {
  readonly id: number;
  readonly key: SubscriberKey;
  readonly label: string;
  readonly computed: boolean;
  readonly failure: Error | undefined;
  recompute(options?: RecomputeOptions): void;
  dispose(): void;
  snapshot(): unknown;
}

export interface ReactionHost {
  readonly tracker: DependencyTracker;
  readonly atoms: AtomRegistry;
  release(reaction: ReactionEntry): void;
}

export class Reaction<T> implements ReactionEntry {
  readonly key: SubscriberKey;
  private result: Atom<T> | undefined;
  private error: Error | undefined;
  private computing = false;
  private disposed = false;

  constructor(
    private readonly host: ReactionHost,
    readonly id: number,
    private compute: () => T,
    private readonly options: ReactionOptions<T> = {},
  ) {
    this.key = reactionKey(id);
    if (!options.startSuspended) {
      this.recompute();
    }
  }

  get label(): string {
    return this.options.name ?? `reaction#${this.id}`;
  }

  /** False until the first computation (only possible with `startSuspended`) */
  get computed(): boolean {
    return this.result !== undefined;
  }

  /** Error of the latest computation, if it threw */
  get failure(): Error | undefined {
    return this.error;
  }

  get exists(): boolean {
    return !this.disposed;
  }

  /**
   * Read the current result, subscribing the current recording scope.
   *
   * @throws ReactivityError when read from its own computation
   * @throws StateError when the reaction was never computed
   */
  get(): T {
    return this.requireResult().get();
  }

  /**
   * Read the current result without subscribing.
   */
  peek(): T {
    return this.requireResult().peek();
  }

  snapshot(): unknown {
    return this.result?.peek();
  }

  /**
   * Recompute now, whatever the state of the sources.
   */
  trigger(): void {
    this.recompute();
  }

  /**
   * Swap the compute function. Takes effect on the next recomputation.
   */
  setCompute(compute: () => T): void {
    this.compute = compute;
  }

  /**
   * Recompute now. The error of a throwing computation is kept for readers
   * and rethrown to the caller.
   */
  recompute(options: RecomputeOptions = {}): void {
    if (this.disposed) return;
    if (this.computing) {
      throw ReactivityError.circular(this.options.name);
    }

    let value: T;
    try {
      value = this.evaluate();
    } catch (thrown) {
      const failed = this.error === undefined;
      this.error = ensureError(thrown);
      if (failed && this.result) {
        this.host.atoms.notify(this.result, options.silentFor);
      }
      throw thrown;
    }

    const recovered = this.error !== undefined;
    this.error = undefined;
    if (this.result) {
      if (recovered) {
        // Readers last saw the error
        this.result.inertSet(value);
        this.host.atoms.notify(this.result, options.silentFor);
      } else if (options.silentFor !== undefined) {
        this.result.setExcept(value, options.silentFor);
      } else {
        this.result.set(value);
      }
    } else {
      this.result = this.host.atoms.create(value, {
        name: this.label,
        equals: this.options.equals,
        owner: this.options.owner,
      });
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.host.tracker.drop(this.key);
    this.result?.remove();
    this.host.release(this);
  }

  private evaluate(): T {
    const tracker = this.host.tracker;
    this.computing = true;
    tracker.begin(this.key, { kind: "reaction", reactionId: this.id });
    try {
      const value = this.compute();
      tracker.end(this.key);
      return value;
    } catch (error) {
      tracker.discard(this.key);
      throw error;
    } finally {
      this.computing = false;
    }
  }

  private requireResult(): Atom<T> {
    if (this.computing) {
      throw ReactivityError.circular(this.options.name);
    }
    if (this.error) {
      throw this.error;
    }
    if (!this.result) {
      throw new StateError(
        this.disposed ? "disposed" : "suspended",
        "computed",
        `Reaction '${this.label}' has not been computed yet; call trigger() first`,
      );
    }
    return this.result;
  }
}
