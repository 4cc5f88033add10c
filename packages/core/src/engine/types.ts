import type { CallIdentity, IdentityKey } from "../identity/call-identity";
import type { OwnedKind, Sweepable } from "../lifecycle/sweeper";
import type { EffectCleanup } from "../lifecycle/effects";
import type { SchedulerState } from "../scheduler/render-scheduler";

/**
 * Effect callbacks run after the render unit that scheduled them.
 * A returned function is kept as the cleanup.
 */
export type EffectCallback = () => void | EffectCleanup;

/**
 * A re-renderable boundary. Its key is the path of the scope it was mounted in.
 */
export interface ComponentRecord extends Sweepable {
  readonly identity: CallIdentity;
  readonly parentKey: IdentityKey | null;
  /** Latest render closure, replayed by the scheduler */
  invoke: () => unknown;
  live: boolean;
  renders: number;
}

export interface PendingEffect {
  readonly key: IdentityKey;
  readonly owner: IdentityKey;
  readonly create: EffectCallback;
}

/**
 * Bookkeeping for the component currently rendering.
 */
export interface RenderFrame {
  readonly record: ComponentRecord;
  readonly visited: Map<IdentityKey, OwnedKind>;
  slots: number;
  readonly effects: PendingEffect[];
}

export interface EngineSnapshot {
  id: string;
  pass: number;
  scheduler: { state: SchedulerState; pending: string[] };
  cells: { identity: string; tag: string }[];
  atoms: {
    id: number;
    label: string;
    scope: string;
    subscribers: string[];
    value: unknown;
  }[];
  components: {
    identity: string;
    parent: string | null;
    live: boolean;
    renders: number;
    owned: string[];
  }[];
  reactions: {
    id: number;
    label: string;
    computed: boolean;
    dependencies: number[];
    value: unknown;
    error: string | null;
  }[];
  history: { length: number; cursor: number };
}
