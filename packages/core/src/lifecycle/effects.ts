/**
 * Effect Registry
 *
 * Cleanup closures keyed by identity. Each identity has at most one effect
 * slot cleanup (the one returned by its `useEffect` callback, replaced on
 * every re-run) plus any number of registered cleanups. All of them run when
 * the sweeper evicts the identity.
 *
 * Cleanup errors are reported as `effect-error` diagnostics and never
 * rethrown; the remaining cleanups still run.
 */

import { ensureError } from "tessera-shared";
import { formatIdentity, type IdentityKey } from "../identity/call-identity";
import type { Diagnostic } from "../diagnostics";

export type EffectCleanup = () => void;

interface EffectEntry {
  slot: EffectCleanup | undefined;
  cleanups: EffectCleanup[];
}

export class EffectRegistry {
  private readonly entries = new Map<IdentityKey, EffectEntry>();

  constructor(private readonly report: (diagnostic: Diagnostic) => void) {}

  /**
   * Store a cleanup that runs when `key` is evicted.
   *
   * @returns a function that unregisters the cleanup without running it
   */
  register(key: IdentityKey, cleanup: EffectCleanup): () => void {
    const entry = this.entry(key);
    entry.cleanups.push(cleanup);
    return () => {
      const index = entry.cleanups.indexOf(cleanup);
      if (index !== -1) {
        entry.cleanups.splice(index, 1);
      }
    };
  }

  /**
   * Set the single effect-slot cleanup of `key`.
   */
  replace(key: IdentityKey, cleanup: EffectCleanup | undefined): void {
    if (cleanup === undefined && !this.entries.has(key)) return;
    this.entry(key).slot = cleanup;
  }

  /**
   * Run and forget the effect-slot cleanup of `key` (before an effect re-runs).
   */
  runSlot(key: IdentityKey): void {
    const entry = this.entries.get(key);
    const cleanup = entry?.slot;
    if (!entry || !cleanup) return;

    entry.slot = undefined;
    this.invoke(key, cleanup);
  }

  /**
   * Run and forget every cleanup of `key`.
   *
   * @returns number of cleanups run
   */
  runCleanups(key: IdentityKey): number {
    const entry = this.entries.get(key);
    if (!entry) return 0;
    this.entries.delete(key);

    const cleanups = entry.slot ? [entry.slot, ...entry.cleanups] : entry.cleanups;
    for (const cleanup of cleanups) {
      this.invoke(key, cleanup);
    }
    return cleanups.length;
  }

  /**
   * Run every cleanup of every identity (engine disposal).
   */
  runAll(): void {
    for (const key of [...this.entries.keys()]) {
      this.runCleanups(key);
    }
  }

  has(key: IdentityKey): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private entry(key: IdentityKey): EffectEntry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { slot: undefined, cleanups: [] };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private invoke(key: IdentityKey, cleanup: EffectCleanup): void {
    try {
      cleanup();
    } catch (thrown) {
      const error = ensureError(thrown);
      this.report({
        kind: "effect-error",
        message: `Cleanup for ${formatIdentity(key)} threw: ${error.message}`,
        target: formatIdentity(key),
        error,
      });
    }
  }
}
