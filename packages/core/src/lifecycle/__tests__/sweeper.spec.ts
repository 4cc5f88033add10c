import { IdentityError } from "tessera-shared";
import { LifecycleSweeper, type OwnedKind, type SweepHost, type Sweepable } from "../sweeper";
import type { Diagnostic } from "../../diagnostics";

describe("LifecycleSweeper", () => {
  let calls: string[];
  let diagnostics: Diagnostic[];
  let host: SweepHost;

  const record = (): Sweepable => ({ key: "0", owned: new Map(), slotCount: null });

  const visit = (...entries: [string, OwnedKind][]) => new Map<string, OwnedKind>(entries);

  beforeEach(() => {
    calls = [];
    diagnostics = [];
    host = {
      evictSlot: (key) => calls.push(`evict ${key}`),
      unmount: (key) => calls.push(`unmount ${key}`),
      suspend: (key, kind) => calls.push(`suspend ${kind} ${key}`),
      report: (diagnostic) => diagnostics.push(diagnostic),
    };
  });

  it("should evict unvisited identities immediately by default", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 1, detectDrift: false });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"], ["0.1", "slot"], ["0.2", "component"]), 2);

    const result = sweeper.sweep(owner, visit(["0.0", "slot"]), 1);

    expect(result.evicted).toEqual(["0.1", "0.2"]);
    expect(calls).toEqual(["evict 0.1", "unmount 0.2"]);
    expect([...owner.owned.keys()]).toEqual(["0.0"]);
  });

  it("should suspend identities until they miss enough renders", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 3, detectDrift: false });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"], ["0.1", "component"]), 1);

    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    const result = sweeper.sweep(owner, visit(["0.0", "slot"]), 1);

    expect(calls).toEqual(["suspend component 0.1", "suspend component 0.1", "unmount 0.1"]);
    expect(result.evicted).toEqual(["0.1"]);
  });

  it("should reset the miss counter when an identity comes back", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 2, detectDrift: false });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);

    sweeper.sweep(owner, visit(), 0);
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    sweeper.sweep(owner, visit(), 0);

    expect(calls).toEqual(["suspend slot 0.0", "suspend slot 0.0"]);
    expect(owner.owned.get("0.0")).toEqual({ kind: "slot", misses: 1 });
  });

  it("should evict a call-site that changed between slot and component", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 1, detectDrift: false });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);

    const result = sweeper.sweep(owner, visit(["0.0", "component"]), 0);

    expect(calls).toEqual(["evict 0.0"]);
    expect(result.evicted).toEqual(["0.0"]);
    expect(owner.owned.get("0.0")).toEqual({ kind: "component", misses: 0 });
  });

  it("should report drift when the slot count changes", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 1, detectDrift: true });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    expect(diagnostics).toHaveLength(0);

    sweeper.sweep(owner, visit(["0.0", "slot"], ["0.1", "slot"]), 2);

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("identity-drift");
    expect(diagnostics[0].target).toBe("0");
    expect(diagnostics[0].error).toBeInstanceOf(IdentityError);
    expect(diagnostics[0].error).toMatchObject({
      code: "IDENTITY_DRIFT",
      details: { owner: "0", previousSlots: 1, currentSlots: 2 },
    });
    expect(owner.slotCount).toBe(2);
  });

  it("should not report drift when detection is off", () => {
    const sweeper = new LifecycleSweeper(host, { sweepAfterPasses: 1, detectDrift: false });
    const owner = record();
    sweeper.sweep(owner, visit(["0.0", "slot"]), 1);
    sweeper.sweep(owner, visit(), 0);

    expect(diagnostics).toHaveLength(0);
  });
});
