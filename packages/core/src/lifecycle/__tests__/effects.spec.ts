import { EffectRegistry } from "../effects";
import type { Diagnostic } from "../../diagnostics";

describe("EffectRegistry", () => {
  let diagnostics: Diagnostic[];
  let registry: EffectRegistry;

  beforeEach(() => {
    diagnostics = [];
    registry = new EffectRegistry((diagnostic) => diagnostics.push(diagnostic));
  });

  it("should run registered cleanups once on eviction", () => {
    const calls: string[] = [];
    registry.register("0.1", () => calls.push("a"));
    registry.register("0.1", () => calls.push("b"));

    expect(registry.runCleanups("0.1")).toBe(2);
    expect(registry.runCleanups("0.1")).toBe(0);
    expect(calls).toEqual(["a", "b"]);
    expect(registry.has("0.1")).toBe(false);
  });

  it("should unregister without running", () => {
    const cleanup = vi.fn();
    const unregister = registry.register("0", cleanup);

    unregister();
    registry.runCleanups("0");

    expect(cleanup).not.toHaveBeenCalled();
  });

  it("should run the slot cleanup before the registered ones", () => {
    const calls: string[] = [];
    registry.register("0", () => calls.push("registered"));
    registry.replace("0", () => calls.push("slot"));

    registry.runCleanups("0");

    expect(calls).toEqual(["slot", "registered"]);
  });

  it("should run and forget only the slot cleanup", () => {
    const slot = vi.fn();
    const registered = vi.fn();
    registry.register("0", registered);
    registry.replace("0", slot);

    registry.runSlot("0");
    registry.runSlot("0");

    expect(slot).toHaveBeenCalledTimes(1);
    expect(registered).not.toHaveBeenCalled();
    expect(registry.has("0")).toBe(true);
  });

  it("should not create an entry for an empty replace", () => {
    registry.replace("0", undefined);

    expect(registry.size).toBe(0);
  });

  it("should report throwing cleanups and keep running the rest", () => {
    const after = vi.fn();
    registry.register("0.2", () => {
      throw new Error("socket already closed");
    });
    registry.register("0.2", after);

    registry.runCleanups("0.2");

    expect(after).toHaveBeenCalledTimes(1);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      kind: "effect-error",
      message: "Cleanup for 0.2 threw: socket already closed",
      target: "0.2",
    });
  });

  it("should run everything on runAll", () => {
    const a = vi.fn();
    const b = vi.fn();
    registry.register("", a);
    registry.replace("0.3", b);

    registry.runAll();

    expect(a).toHaveBeenCalledTimes(1);
    expect(b).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });
});
