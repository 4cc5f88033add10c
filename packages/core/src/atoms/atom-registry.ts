/**
 * Atom Registry
 *
 * Owns every atom of an engine: creates them, hands reads to the dependency
 * tracker, routes change notifications to subscribers and disposes atoms
 * scoped to identities the sweeper evicts. Derived values (reactions) are
 * layered on top of the primitive cells held here.
 */

import { StaleHandleError, ValidationError } from "tessera-shared";
import { Logger } from "tessera-kernel";
import type { IdentityKey } from "../identity/call-identity";
import type { DependencyTracker, SubscriberKey, SubscriberTarget } from "../tracking/dependency-tracker";
import type { Diagnostic } from "../diagnostics";
import type { History, HistoryCommand } from "./history";
import {
  Atom,
  type AtomDefinition,
  type AtomEntry,
  type AtomHost,
  type AtomOptions,
} from "./atom";

const log = Logger.for("AtomRegistry");

export interface AtomRegistryDeps {
  tracker: DependencyTracker;
  history: History;
  /** Called once per subscriber of a changed atom */
  notify: (target: SubscriberTarget) => void;
  report: (diagnostic: Diagnostic) => void;
}

/**
 * Narrow an erased entry to the atom a definition created.
 */
function isAtomOf<T>(entry: AtomEntry, definition: AtomDefinition<T>): entry is Atom<T> {
  return entry instanceof Atom && entry.definition === definition;
}

export class AtomRegistry implements AtomHost {
  private readonly atoms = new Map<number, AtomEntry>();
  private readonly byName = new Map<string, AtomEntry>();
  private readonly owned = new Map<IdentityKey, Set<AtomEntry>>();
  private nextId = 1;

  constructor(private readonly deps: AtomRegistryDeps) {}

  // ==========================================================================
  // Creation
  // ==========================================================================

  create<T>(initial: T, options: AtomOptions<T> = {}): Atom<T> {
    return this.register(new Atom(this, this.nextId++, () => initial, options));
  }

  /**
   * Create an atom whose value (and `reset()` value) comes from `init`.
   */
  createWith<T>(init: () => T, options: AtomOptions<T> = {}): Atom<T> {
    return this.register(new Atom(this, this.nextId++, init, options));
  }

  /**
   * Return the atom of a definition, creating it on first use.
   *
   * @throws ValidationError when another definition already uses the name
   */
  named<T>(definition: AtomDefinition<T>): Atom<T> {
    const existing = this.byName.get(definition.name);
    if (existing) {
      if (isAtomOf(existing, definition)) {
        return existing;
      }
      throw new ValidationError(
        "name",
        `Atom name '${definition.name}' is already used by another definition`,
        { received: definition.name },
      );
    }

    const atom = new Atom(
      this,
      this.nextId++,
      definition.init,
      { ...definition.options, name: definition.name },
      definition,
    );
    this.byName.set(definition.name, atom);
    return this.register(atom);
  }

  private register<T>(atom: Atom<T>): Atom<T> {
    this.atoms.set(atom.id, atom);
    if (atom.scope.kind === "scoped") {
      const owner = atom.scope.owner;
      let set = this.owned.get(owner);
      if (!set) {
        set = new Set();
        this.owned.set(owner, set);
      }
      set.add(atom);
    }
    log.trace({ atom: atom.label, scope: atom.scope.kind }, "Atom created");
    return atom;
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  read<T>(atom: Atom<T>): T {
    return atom.get();
  }

  peek<T>(atom: Atom<T>): T {
    return atom.peek();
  }

  write<T>(atom: Atom<T>, value: T): void {
    atom.set(value);
  }

  get(id: number): AtomEntry | undefined {
    return this.atoms.get(id);
  }

  exists(atom: AtomEntry): boolean {
    return this.atoms.get(atom.id) === atom;
  }

  entries(): AtomEntry[] {
    return [...this.atoms.values()];
  }

  get size(): number {
    return this.atoms.size;
  }

  // ==========================================================================
  // Disposal
  // ==========================================================================

  /**
   * Dispose every atom scoped to `owner`.
   *
   * @returns number of atoms disposed
   */
  disposeOwnedBy(owner: IdentityKey): number {
    const set = this.owned.get(owner);
    if (!set) return 0;

    const atoms = [...set];
    for (const atom of atoms) {
      atom.remove();
    }
    this.owned.delete(owner);
    return atoms.length;
  }

  disposeAll(): void {
    for (const atom of [...this.atoms.values()]) {
      atom.remove();
    }
    this.owned.clear();
    this.byName.clear();
  }

  // ==========================================================================
  // AtomHost
  // ==========================================================================

  track(atom: AtomEntry): void {
    this.deps.tracker.record(atom);
  }

  /**
   * Notify every subscriber of `atom` but `silent`. A subscriber that throws
   * does not stop the others; the first error is rethrown once all were notified.
   */
  notify(atom: AtomEntry, silent?: SubscriberKey): void {
    let failure: { error: unknown } | undefined;
    for (const key of [...atom.subscribers]) {
      if (key === silent) continue;
      const target = this.deps.tracker.targetOf(key);
      if (!target) continue;
      try {
        this.deps.notify(target);
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure) {
      throw failure.error;
    }
  }

  record(command: HistoryCommand): void {
    this.deps.history.record(command);
  }

  stale(atom: AtomEntry, operation: string): void {
    const error = new StaleHandleError(
      atom.label,
      `${operation}() on removed atom '${atom.label}' was ignored`,
    );
    this.deps.report({
      kind: "stale-handle-write",
      message: error.message,
      target: atom.label,
      error,
    });
  }

  release(atom: AtomEntry): void {
    this.deps.tracker.forget(atom);
    this.atoms.delete(atom.id);
    if (this.byName.get(atom.label) === atom) {
      this.byName.delete(atom.label);
    }
    if (atom.scope.kind === "scoped") {
      this.owned.get(atom.scope.owner)?.delete(atom);
    }
    log.trace({ atom: atom.label }, "Atom removed");
  }
}
