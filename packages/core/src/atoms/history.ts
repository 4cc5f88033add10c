/**
 * Undo/redo log fed by reversible atoms.
 *
 * Every write to an atom created with `reversible: true` pushes a command
 * holding the write and its inverse. Recording a command while the cursor is
 * behind the end truncates the redo tail. Commands applied by the history
 * itself are not recorded again.
 *
 * @example
 * ```typescript
 * const title = engine.atoms.create('draft', { reversible: true });
 * title.set('final');
 * engine.history.undo();   // title.peek() === 'draft'
 * engine.history.redo();   // title.peek() === 'final'
 * ```
 */

import { ValidationError } from "tessera-shared";
import { Logger } from "tessera-kernel";

const log = Logger.for("History");

export interface HistoryCommand {
  /** Label of the atom the command writes to */
  readonly label: string;
  redo(): void;
  undo(): void;
}

export interface HistoryOptions {
  /** Maximum number of commands kept; the oldest are dropped first. 0 disables recording. */
  limit: number;
  /** Wraps command application, e.g. in a scheduler batch */
  apply?: (fn: () => void) => void;
}

export class History {
  private commands: HistoryCommand[] = [];
  private _cursor = 0;
  private applying = false;
  private readonly limit: number;
  private readonly apply: (fn: () => void) => void;

  constructor(options: HistoryOptions) {
    this.limit = options.limit;
    this.apply = options.apply ?? ((fn) => fn());
  }

  record(command: HistoryCommand): void {
    if (this.applying || this.limit === 0) return;

    this.commands.length = this._cursor;
    this.commands.push(command);
    this._cursor += 1;

    if (this.commands.length > this.limit) {
      this.commands.shift();
      this._cursor -= 1;
    }
  }

  /** True while the history is applying one of its own commands */
  get isApplying(): boolean {
    return this.applying;
  }

  get cursor(): number {
    return this._cursor;
  }

  get length(): number {
    return this.commands.length;
  }

  get canUndo(): boolean {
    return this._cursor > 0;
  }

  get canRedo(): boolean {
    return this._cursor < this.commands.length;
  }

  /**
   * @returns false when there was nothing to undo
   */
  undo(): boolean {
    if (!this.canUndo) return false;
    this.run(() => this.stepBack());
    return true;
  }

  /**
   * @returns false when there was nothing to redo
   */
  redo(): boolean {
    if (!this.canRedo) return false;
    this.run(() => this.stepForward());
    return true;
  }

  /**
   * Undo or redo until the cursor reaches `target`.
   *
   * @throws ValidationError when `target` is outside `[0, length]`
   */
  travelTo(target: number): void {
    if (!Number.isInteger(target) || target < 0 || target > this.commands.length) {
      throw new ValidationError(
        "cursor",
        `History cursor must be an integer between 0 and ${this.commands.length}`,
        { received: String(target) },
      );
    }

    this.run(() => {
      while (this._cursor > target) this.stepBack();
      while (this._cursor < target) this.stepForward();
    });
  }

  clear(): void {
    this.commands = [];
    this._cursor = 0;
  }

  private stepBack(): void {
    const command = this.commands[this._cursor - 1];
    command.undo();
    this._cursor -= 1;
    log.debug({ label: command.label, cursor: this._cursor }, "Undo");
  }

  private stepForward(): void {
    const command = this.commands[this._cursor];
    command.redo();
    this._cursor += 1;
    log.debug({ label: command.label, cursor: this._cursor }, "Redo");
  }

  private run(fn: () => void): void {
    this.apply(() => {
      const wasApplying = this.applying;
      this.applying = true;
      try {
        fn();
      } finally {
        this.applying = wasApplying;
      }
    });
  }
}
