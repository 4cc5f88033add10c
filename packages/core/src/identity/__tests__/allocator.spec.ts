import { IdentityAllocator } from "../allocator";
import {
  formatIdentity,
  identityKey,
  isAncestorKey,
} from "../call-identity";

describe("IdentityAllocator", () => {
  let allocator: IdentityAllocator;

  beforeEach(() => {
    allocator = new IdentityAllocator();
  });

  it("should number siblings in call order", () => {
    expect(allocator.nextId()).toEqual([0]);
    expect(allocator.nextId()).toEqual([1]);
    expect(allocator.nextId()).toEqual([2]);
  });

  it("should consume one identity per scope and restart counters inside it", () => {
    allocator.nextId();
    const inner = allocator.withScope((path) => {
      expect(path).toEqual([1]);
      return [allocator.nextId(), allocator.nextId()];
    });

    expect(inner).toEqual([
      [1, 0],
      [1, 1],
    ]);
    expect(allocator.nextId()).toEqual([2]);
  });

  it("should produce the same sequence after reset", () => {
    const run = () => {
      const ids = [allocator.nextId()];
      allocator.withScope(() => {
        ids.push(allocator.nextId());
        allocator.withScope(() => ids.push(allocator.nextId()));
      });
      ids.push(allocator.nextId());
      return ids.map(identityKey);
    };

    const first = run();
    allocator.reset();
    const second = run();

    expect(first).toEqual(["0", "1.0", "1.1.0", "2"]);
    expect(second).toEqual(first);
  });

  it("should reset to a replay root", () => {
    allocator.reset([0, 3]);

    expect(allocator.current()).toEqual([0, 3]);
    expect(allocator.nextId()).toEqual([0, 3, 0]);
  });

  it("should release scopes when the callback throws", () => {
    expect(() =>
      allocator.withScope(() => {
        throw new Error("render failed");
      }),
    ).toThrow("render failed");

    expect(allocator.depth).toBe(1);
    expect(allocator.nextId()).toEqual([1]);
  });

  it("should reject out-of-order releases", () => {
    const outer = allocator.enterScope();
    const inner = allocator.enterScope();

    expect(() => outer.release()).toThrow("Scope 0 released while 0.0 is the innermost scope");

    inner.release();
    outer.release();
    expect(allocator.depth).toBe(1);
  });

  it("should ignore a second release of the same guard", () => {
    const guard = allocator.enterScope();
    guard.release();

    expect(() => guard.release()).not.toThrow();
    expect(allocator.depth).toBe(1);
  });
});

describe("call identity helpers", () => {
  it("should key and format identities", () => {
    expect(identityKey([0, 2, 1])).toBe("0.2.1");
    expect(identityKey([])).toBe("");
    expect(formatIdentity([])).toBe("<root>");
    expect(formatIdentity("3.1")).toBe("3.1");
  });

  it("should detect strict ancestors", () => {
    expect(isAncestorKey("", "0")).toBe(true);
    expect(isAncestorKey("0", "0.1")).toBe(true);
    expect(isAncestorKey("0", "01")).toBe(false);
    expect(isAncestorKey("1", "10.2")).toBe(false);
    expect(isAncestorKey("0.1", "0.1")).toBe(false);
    expect(isAncestorKey("0.1", "0")).toBe(false);
  });
});
