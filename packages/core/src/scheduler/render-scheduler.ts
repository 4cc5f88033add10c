/**
 * Render Scheduler
 *
 * State machine: idle → collecting → flushing → idle.
 *
 * Writes enqueue the component that has to re-render. While a phase is open
 * (`batch()`, `runPass()`) tasks only collect; when the outermost phase ends
 * the scheduler flushes them. Writes outside any phase open an implicit one
 * that ends on the next microtask (`autoFlush: "microtask"`) or on an explicit
 * `flush()` (`autoFlush: "manual"`).
 *
 * A flush renders each pending component once per round, in insertion order.
 * A task is skipped when its component is no longer live or when one of its
 * ancestors is pending in the same round, since the ancestor renders it
 * anyway. Writes made while flushing land in the next round; a flush that is
 * still producing work after `maxReentrantRounds` rounds fails with
 * ReentrantUpdateError.
 */

import { ReentrantUpdateError } from "tessera-shared";
import { Logger } from "tessera-kernel";
import { formatIdentity, isAncestorKey, type IdentityKey } from "../identity/call-identity";

const log = Logger.for("RenderScheduler");

export type SchedulerState = "idle" | "collecting" | "flushing";

export type AutoFlush = "microtask" | "manual";

export interface SchedulerHost {
  isLive(key: IdentityKey): boolean;
  render(key: IdentityKey): void;
  /** Receives errors thrown by flushes started from a microtask */
  handleAsyncError(error: unknown): void;
}

export interface SchedulerOptions {
  maxReentrantRounds: number;
  autoFlush: AutoFlush;
}

export interface FlushResult {
  /** Components rendered in each round */
  rounds: IdentityKey[][];
  rendered: number;
}

export class RenderScheduler {
  private _state: SchedulerState = "idle";
  private readonly pending = new Set<IdentityKey>();
  private phaseDepth = 0;
  private microtaskQueued = false;
  private closed = false;

  constructor(
    private readonly host: SchedulerHost,
    private readonly options: SchedulerOptions,
  ) {}

  get state(): SchedulerState {
    return this._state;
  }

  get pendingKeys(): IdentityKey[] {
    return [...this.pending];
  }

  get inPhase(): boolean {
    return this.phaseDepth > 0;
  }

  /**
   * Request a render of `key`.
   *
   * @returns false when the task was already pending
   */
  enqueue(key: IdentityKey): boolean {
    if (this.closed) return false;

    const added = !this.pending.has(key);
    this.pending.add(key);

    if (this._state === "idle") {
      this._state = "collecting";
    }
    if (this._state === "collecting" && this.phaseDepth === 0 && this.options.autoFlush === "microtask") {
      this.scheduleMicrotask();
    }
    return added;
  }

  /**
   * Run `fn` as one phase. Tasks it enqueues are flushed when the outermost phase ends.
   * If `fn` throws, the outermost phase drops its pending tasks.
   */
  batch<T>(fn: () => T): T {
    let result: T;
    this.phaseDepth += 1;
    try {
      result = fn();
    } catch (error) {
      this.phaseDepth -= 1;
      if (this.phaseDepth === 0 && this._state === "collecting") {
        this.abort();
      }
      throw error;
    }
    this.phaseDepth -= 1;

    if (this.phaseDepth === 0 && this._state === "collecting") {
      this.flush();
    }
    return result;
  }

  /**
   * Render every pending task, round after round, until nothing is pending.
   * Calling flush() while flushing is a no-op: the running flush picks up new tasks.
   *
   * @throws ReentrantUpdateError when work remains after `maxReentrantRounds` rounds
   */
  flush(): FlushResult {
    const result: FlushResult = { rounds: [], rendered: 0 };
    if (this._state === "flushing") return result;
    if (this.pending.size === 0) {
      this._state = "idle";
      return result;
    }

    this._state = "flushing";
    try {
      while (this.pending.size > 0) {
        if (result.rounds.length >= this.options.maxReentrantRounds) {
          const error = ReentrantUpdateError.overflow(
            this.options.maxReentrantRounds,
            result.rounds.map((round) => round.map(formatIdentity)),
          );
          log.error({ err: error, pending: this.pendingKeys.map(formatIdentity) }, "Reentrant update limit");
          throw error;
        }

        const round = [...this.pending];
        this.pending.clear();
        const rendered: IdentityKey[] = [];

        for (const key of round) {
          if (!this.host.isLive(key)) {
            log.debug({ identity: formatIdentity(key) }, "Skipping task for unmounted component");
            continue;
          }
          if (round.some((other) => isAncestorKey(other, key) && this.host.isLive(other))) {
            continue;
          }
          this.host.render(key);
          rendered.push(key);
        }

        result.rounds.push(rendered);
        result.rendered += rendered.length;
      }
    } catch (error) {
      this.pending.clear();
      throw error;
    } finally {
      this._state = "idle";
    }

    log.debug({ rounds: result.rounds.length, rendered: result.rendered }, "Flush complete");
    return result;
  }

  /**
   * Drop pending tasks and return to idle.
   */
  abort(): void {
    this.pending.clear();
    if (this._state !== "flushing") {
      this._state = "idle";
    }
  }

  /**
   * Stop accepting tasks (engine disposal).
   */
  close(): void {
    this.closed = true;
    this.abort();
  }

  private scheduleMicrotask(): void {
    if (this.microtaskQueued) return;
    this.microtaskQueued = true;

    queueMicrotask(() => {
      this.microtaskQueued = false;
      if (this.closed || this._state !== "collecting" || this.phaseDepth > 0) return;

      try {
        this.flush();
      } catch (error) {
        this.host.handleAsyncError(error);
      }
    });
  }
}
