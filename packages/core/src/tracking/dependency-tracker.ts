/**
 * Dependency Tracker
 *
 * Records which atoms are read inside a recording scope (a component render
 * or a reaction computation) and turns the reads into subscriptions when the
 * scope ends. A committed set replaces the subscriber's previous set
 * wholesale, so an atom that is no longer read stops notifying on the very
 * next render without any explicit unsubscribe.
 */

import { StateError } from "tessera-shared";
import { Logger } from "tessera-kernel";
import type { IdentityKey } from "../identity/call-identity";

const log = Logger.for("DependencyTracker");

// ============================================================================
// Types
// ============================================================================

/**
 * Key of a recording scope: a component's identity key, or `rx:<id>` for reactions.
 */
export type SubscriberKey = string;

export type SubscriberTarget =
  | { readonly kind: "component"; readonly componentKey: IdentityKey }
  | { readonly kind: "reaction"; readonly reactionId: number };

/**
 * Anything with a subscriber set that reads can be recorded against.
 */
export interface Trackable {
  readonly id: number;
  readonly subscribers: Set<SubscriberKey>;
}

interface Recording {
  readonly key: SubscriberKey;
  readonly target: SubscriberTarget;
  readonly reads: Set<Trackable>;
}

interface Subscription {
  readonly target: SubscriberTarget;
  readonly sources: Set<Trackable>;
}

/** Marks an `untracked()` region on the recording stack */
const UNTRACKED = null;

export function reactionKey(reactionId: number): SubscriberKey {
  return `rx:${reactionId}`;
}

// ============================================================================
// Tracker
// ============================================================================

export class DependencyTracker {
  private readonly stack: (Recording | typeof UNTRACKED)[] = [];
  private readonly subscriptions = new Map<SubscriberKey, Subscription>();

  /**
   * Open a recording scope. Scopes nest; reads go to the innermost one.
   */
  begin(key: SubscriberKey, target: SubscriberTarget): void {
    this.stack.push({ key, target, reads: new Set() });
  }

  /**
   * Record a read against the innermost scope, if any.
   */
  record(source: Trackable): void {
    const top = this.stack[this.stack.length - 1];
    if (top) {
      top.reads.add(source);
    }
  }

  /**
   * Commit the innermost scope, replacing the key's previous subscriptions.
   *
   * @returns ids of the sources now subscribed to
   */
  end(key: SubscriberKey): number[] {
    const recording = this.pop(key);
    const previous = this.subscriptions.get(key);

    if (previous) {
      for (const source of previous.sources) {
        if (!recording.reads.has(source)) {
          source.subscribers.delete(key);
        }
      }
    }

    for (const source of recording.reads) {
      source.subscribers.add(key);
    }

    if (recording.reads.size > 0) {
      this.subscriptions.set(key, { target: recording.target, sources: recording.reads });
    } else {
      this.subscriptions.delete(key);
    }

    if (log.isLevelEnabled("trace")) {
      log.trace({ subscriber: key, sources: recording.reads.size }, "Dependencies committed");
    }

    return [...recording.reads].map((source) => source.id);
  }

  /**
   * Close the innermost scope without committing, keeping the previous subscriptions.
   * Used when a render or computation throws.
   */
  discard(key: SubscriberKey): void {
    this.pop(key);
  }

  /**
   * Remove every subscription of `key`.
   */
  drop(key: SubscriberKey): void {
    const subscription = this.subscriptions.get(key);
    if (!subscription) return;

    for (const source of subscription.sources) {
      source.subscribers.delete(key);
    }
    this.subscriptions.delete(key);
  }

  /**
   * Detach a source that is going away from every subscriber that read it.
   */
  forget(source: Trackable): void {
    for (const key of source.subscribers) {
      this.subscriptions.get(key)?.sources.delete(source);
    }
    source.subscribers.clear();
  }

  /**
   * Run `fn` without recording any of its reads.
   * Scopes opened inside `fn` record as usual.
   */
  untracked<T>(fn: () => T): T {
    this.stack.push(UNTRACKED);
    try {
      return fn();
    } finally {
      this.stack.pop();
    }
  }

  dependenciesOf(key: SubscriberKey): number[] {
    const subscription = this.subscriptions.get(key);
    return subscription ? [...subscription.sources].map((source) => source.id) : [];
  }

  targetOf(key: SubscriberKey): SubscriberTarget | undefined {
    return this.subscriptions.get(key)?.target;
  }

  /** True while a scope other than `untracked()` is innermost */
  get isTracking(): boolean {
    return Boolean(this.stack[this.stack.length - 1]);
  }

  /** True while `key` has an open scope anywhere on the stack */
  isRecording(key: SubscriberKey): boolean {
    return this.stack.some((recording) => recording?.key === key);
  }

  subscriberKeys(): SubscriberKey[] {
    return [...this.subscriptions.keys()];
  }

  private pop(key: SubscriberKey): Recording {
    const top = this.stack[this.stack.length - 1];
    if (!top || top.key !== key) {
      throw new StateError(
        top ? top.key : "untracked",
        key,
        `Cannot end recording '${key}': it is not the innermost scope`,
        "STATE_TRANSITION",
      );
    }
    this.stack.pop();
    return top;
  }
}
