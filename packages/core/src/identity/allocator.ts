/**
 * Topological Identity Allocator
 *
 * Hands out CallIdentities from an explicit stack of counters. Each frame
 * holds the path of its scope and the counter of the next sibling at that
 * depth. Entering a scope consumes one identity of the current level and
 * pushes a fresh frame whose counter starts at zero; releasing the scope pops
 * it and the parent's counter carries on where it left off.
 *
 * Identities are only stable when every render calls hooks in the same order
 * and nesting. A hook called on some renders only shifts every identity after
 * it.
 *
 * @example
 * ```typescript
 * const allocator = new IdentityAllocator();
 * allocator.nextId();                       // [0]
 * allocator.withScope(() => {
 *   allocator.nextId();                     // [1, 0]
 *   allocator.nextId();                     // [1, 1]
 * });
 * allocator.nextId();                       // [2]
 * ```
 */

import { IdentityError } from "tessera-shared";
import { identityKey, type CallIdentity } from "./call-identity";

interface Frame {
  readonly path: CallIdentity;
  counter: number;
}

/**
 * Returned by `enterScope()`. Releasing a guard twice is a no-op.
 */
export interface ScopeGuard {
  readonly path: CallIdentity;
  release(): void;
}

export class IdentityAllocator {
  private stack: Frame[] = [{ path: [], counter: 0 }];

  /**
   * Clear the stack down to a single frame at `rootPath`.
   * A full pass resets to `[]`; replaying one component resets to its path.
   */
  reset(rootPath: CallIdentity = []): void {
    this.stack = [{ path: rootPath, counter: 0 }];
  }

  nextId(): CallIdentity {
    const frame = this.top();
    const id = [...frame.path, frame.counter];
    frame.counter += 1;
    return id;
  }

  enterScope(): ScopeGuard {
    const path = this.nextId();
    const frame: Frame = { path, counter: 0 };
    this.stack.push(frame);

    let released = false;
    return {
      path,
      release: () => {
        if (released) return;
        const top = this.top();
        if (top !== frame) {
          throw IdentityError.unbalanced(identityKey(top.path), identityKey(frame.path));
        }
        released = true;
        this.stack.pop();
      },
    };
  }

  /**
   * Run `fn` inside a fresh scope, releasing it on every exit path.
   */
  withScope<T>(fn: (path: CallIdentity) => T): T {
    const guard = this.enterScope();
    try {
      return fn(guard.path);
    } finally {
      guard.release();
    }
  }

  /** Path of the innermost scope */
  current(): CallIdentity {
    return this.top().path;
  }

  get depth(): number {
    return this.stack.length;
  }

  // The root frame is never popped
  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }
}
