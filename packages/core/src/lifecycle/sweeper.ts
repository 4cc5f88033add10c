/**
 * Lifecycle Sweeper
 *
 * Runs after every render of a component, full pass or replay. Each
 * identity the component owns (its hook slots and child components) carries
 * a miss counter: visited identities reset it, unvisited ones increment it,
 * and at `sweepAfterPasses` misses the identity is evicted. Until then an
 * unvisited identity keeps its state but loses its subscriptions, so atom
 * writes never reach call-sites that are no longer rendered.
 */

import { IdentityError } from "tessera-shared";
import { Logger } from "tessera-kernel";
import { formatIdentity, type IdentityKey } from "../identity/call-identity";
import type { Diagnostic } from "../diagnostics";

const log = Logger.for("LifecycleSweeper");

export type OwnedKind = "slot" | "component";

export interface OwnedEntry {
  kind: OwnedKind;
  misses: number;
}

/**
 * The part of a component record the sweeper reads and updates.
 */
export interface Sweepable {
  readonly key: IdentityKey;
  readonly owned: Map<IdentityKey, OwnedEntry>;
  /** Hook slots used by the previous render, null before the first one */
  slotCount: number | null;
}

export interface SweepHost {
  /** Remove a hook slot: state cell, cleanups, subscriptions, scoped atoms */
  evictSlot(key: IdentityKey): void;
  /** Unmount a child component and its whole subtree */
  unmount(componentKey: IdentityKey): void;
  /** Prune subscriptions of an unvisited identity that is kept for now */
  suspend(key: IdentityKey, kind: OwnedKind): void;
  report(diagnostic: Diagnostic): void;
}

export interface SweeperOptions {
  sweepAfterPasses: number;
  /** Report `identity-drift` when the number of hook slots changes */
  detectDrift: boolean;
}

export interface SweepResult {
  evicted: IdentityKey[];
  suspended: IdentityKey[];
}

export class LifecycleSweeper {
  constructor(
    private readonly host: SweepHost,
    private readonly options: SweeperOptions,
  ) {}

  /**
   * Reconcile a component's owned identities with what its latest render visited.
   */
  sweep(record: Sweepable, visited: ReadonlyMap<IdentityKey, OwnedKind>, slotCount: number): SweepResult {
    const result: SweepResult = { evicted: [], suspended: [] };

    for (const [key, kind] of visited) {
      const entry = record.owned.get(key);
      if (entry && entry.kind !== kind) {
        // The call-site changed from a slot to a component or back
        this.evict(key, entry.kind);
        result.evicted.push(key);
      }
      if (entry && entry.kind === kind) {
        entry.misses = 0;
      } else {
        record.owned.set(key, { kind, misses: 0 });
      }
    }

    for (const [key, entry] of record.owned) {
      if (visited.has(key)) continue;

      entry.misses += 1;
      if (entry.misses >= this.options.sweepAfterPasses) {
        record.owned.delete(key);
        this.evict(key, entry.kind);
        result.evicted.push(key);
      } else {
        this.host.suspend(key, entry.kind);
        result.suspended.push(key);
      }
    }

    if (this.options.detectDrift && record.slotCount !== null && record.slotCount !== slotCount) {
      const error = IdentityError.drift(record.key, record.slotCount, slotCount);
      this.host.report({
        kind: "identity-drift",
        message: error.message,
        target: formatIdentity(record.key),
        error,
      });
    }
    record.slotCount = slotCount;

    if (result.evicted.length > 0) {
      log.debug(
        { owner: formatIdentity(record.key), evicted: result.evicted.map(formatIdentity) },
        "Evicted unvisited identities",
      );
    }

    return result;
  }

  private evict(key: IdentityKey, kind: OwnedKind): void {
    if (kind === "component") {
      this.host.unmount(key);
    } else {
      this.host.evictSlot(key);
    }
  }
}
