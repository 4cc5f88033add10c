/**
 * Type-Erased State Store
 *
 * Maps call identities to StateCells. Values are stored without their static
 * type; each cell carries the name of the TypeTag it was created with, and
 * every read checks the requested tag against it. A mismatch means the
 * call-site now belongs to a different hook, which is a programming error.
 */

import { TypeMismatchError, ValidationError } from "tessera-shared";
import { formatIdentity, identityKey, type CallIdentity, type IdentityKey } from "../identity/call-identity";

// ============================================================================
// Types
// ============================================================================

/**
 * Runtime stand-in for the static type of a stored value.
 * Two tags with the same name are the same type as far as the store is concerned.
 */
export interface TypeTag<T> {
  readonly name: string;
  /** Optional guard checked against freshly initialized values */
  readonly validate?: (value: unknown) => value is T;
}

/**
 * Create a TypeTag.
 *
 * @example
 * ```typescript
 * const counterTag = typeTag<number>('counter', (v): v is number => typeof v === 'number');
 * ```
 */
export function typeTag<T>(name: string, validate?: (value: unknown) => value is T): TypeTag<T> {
  return validate ? { name, validate } : { name };
}

export class StateCell<T> {
  readonly key: IdentityKey;
  private _disposed = false;

  constructor(
    readonly identity: CallIdentity,
    readonly tag: string,
    private value: T,
  ) {
    this.key = identityKey(identity);
  }

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** @internal */
  dispose(): void {
    this._disposed = true;
  }
}

/**
 * Tag check that narrows an erased cell back to its typed form.
 */
export function isCellOf<T>(cell: StateCell<unknown>, tag: TypeTag<T>): cell is StateCell<T> {
  return cell.tag === tag.name;
}

// ============================================================================
// Store
// ============================================================================

export interface StateStoreOptions {
  /** Run `validate` guards of TypeTags on initialization (default: true) */
  validate?: boolean;
}

export class StateStore {
  private readonly cells = new Map<IdentityKey, StateCell<unknown>>();
  private readonly validate: boolean;

  constructor(options: StateStoreOptions = {}) {
    this.validate = options.validate ?? true;
  }

  /**
   * Return the cell stored at `identity`, creating it with `init` on first visit.
   *
   * @throws TypeMismatchError when the stored cell was created with another tag
   * @throws ValidationError when `init` returns a value the tag's guard rejects
   */
  getOrInit<T>(
    identity: CallIdentity,
    tag: TypeTag<T>,
    init: (identity: CallIdentity) => T,
  ): StateCell<T> {
    const key = identityKey(identity);
    const existing = this.cells.get(key);

    if (existing) {
      if (isCellOf(existing, tag)) {
        return existing;
      }
      throw new TypeMismatchError(identity, existing.tag, tag.name);
    }

    const value = init(identity);
    if (this.validate && tag.validate && !tag.validate(value)) {
      throw ValidationError.type(`state at ${formatIdentity(key)}`, tag.name, typeof value);
    }

    const cell = new StateCell(identity, tag.name, value);
    this.cells.set(key, cell);
    return cell;
  }

  /**
   * Evict a cell. The cell is marked disposed so outstanding setters can tell.
   */
  remove(identity: CallIdentity | IdentityKey): boolean {
    const key = typeof identity === "string" ? identity : identityKey(identity);
    const cell = this.cells.get(key);
    if (!cell) return false;

    cell.dispose();
    this.cells.delete(key);
    return true;
  }

  has(identity: CallIdentity | IdentityKey): boolean {
    return this.cells.has(typeof identity === "string" ? identity : identityKey(identity));
  }

  /**
   * Erased read for inspection; hooks go through `getOrInit`.
   */
  peek(identity: CallIdentity | IdentityKey): StateCell<unknown> | undefined {
    return this.cells.get(typeof identity === "string" ? identity : identityKey(identity));
  }

  keys(): IdentityKey[] {
    return [...this.cells.keys()];
  }

  get size(): number {
    return this.cells.size;
  }

  clear(): void {
    for (const cell of this.cells.values()) {
      cell.dispose();
    }
    this.cells.clear();
  }
}
