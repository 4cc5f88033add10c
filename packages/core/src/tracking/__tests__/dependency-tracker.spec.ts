import { isStateError } from "tessera-shared";
import { DependencyTracker, reactionKey, type Trackable } from "../dependency-tracker";

function source(id: number): Trackable {
  return { id, subscribers: new Set() };
}

describe("DependencyTracker", () => {
  let tracker: DependencyTracker;
  const component = (key: string) => ({ kind: "component", componentKey: key }) as const;

  beforeEach(() => {
    tracker = new DependencyTracker();
  });

  it("should subscribe the scope to every source read", () => {
    const a = source(1);
    const b = source(2);

    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.record(b);
    tracker.record(a);
    const committed = tracker.end("0");

    expect(committed).toEqual([1, 2]);
    expect([...a.subscribers]).toEqual(["0"]);
    expect([...b.subscribers]).toEqual(["0"]);
    expect(tracker.dependenciesOf("0")).toEqual([1, 2]);
    expect(tracker.targetOf("0")).toEqual({ kind: "component", componentKey: "0" });
  });

  it("should replace rather than merge previous subscriptions", () => {
    const a = source(1);
    const b = source(2);

    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.record(b);
    tracker.end("0");

    tracker.begin("0", component("0"));
    tracker.record(b);
    tracker.end("0");

    expect(a.subscribers.size).toBe(0);
    expect([...b.subscribers]).toEqual(["0"]);
    expect(tracker.dependenciesOf("0")).toEqual([2]);
  });

  it("should forget the subscriber entirely when nothing is read", () => {
    const a = source(1);
    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.end("0");

    tracker.begin("0", component("0"));
    tracker.end("0");

    expect(a.subscribers.size).toBe(0);
    expect(tracker.targetOf("0")).toBeUndefined();
    expect(tracker.subscriberKeys()).toEqual([]);
  });

  it("should record reads in the innermost scope only", () => {
    const outerRead = source(1);
    const innerRead = source(2);

    tracker.begin("0", component("0"));
    tracker.record(outerRead);
    tracker.begin(reactionKey(7), { kind: "reaction", reactionId: 7 });
    expect(tracker.isRecording("0")).toBe(true);
    tracker.record(innerRead);
    tracker.end("rx:7");
    tracker.end("0");

    expect(tracker.dependenciesOf("0")).toEqual([1]);
    expect(tracker.dependenciesOf("rx:7")).toEqual([2]);
    expect(tracker.targetOf("rx:7")).toEqual({ kind: "reaction", reactionId: 7 });
  });

  it("should ignore reads outside any scope and inside untracked()", () => {
    const a = source(1);
    tracker.record(a);

    tracker.begin("0", component("0"));
    const value = tracker.untracked(() => {
      expect(tracker.isTracking).toBe(false);
      tracker.record(a);
      return 42;
    });
    expect(tracker.isTracking).toBe(true);
    tracker.end("0");

    expect(value).toBe(42);
    expect(a.subscribers.size).toBe(0);
  });

  it("should keep previous subscriptions when a scope is discarded", () => {
    const a = source(1);
    const b = source(2);
    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.end("0");

    tracker.begin("0", component("0"));
    tracker.record(b);
    tracker.discard("0");

    expect(tracker.dependenciesOf("0")).toEqual([1]);
    expect(b.subscribers.size).toBe(0);
  });

  it("should throw StateError when ending a scope that is not innermost", () => {
    tracker.begin("0", component("0"));
    tracker.begin("0.1", component("0.1"));

    let caught: unknown;
    try {
      tracker.end("0");
    } catch (error) {
      caught = error;
    }

    expect(isStateError(caught)).toBe(true);
    expect(caught).toMatchObject({ code: "STATE_TRANSITION" });
  });

  it("should drop every subscription of a key", () => {
    const a = source(1);
    const b = source(2);
    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.record(b);
    tracker.end("0");

    tracker.drop("0");

    expect(a.subscribers.size).toBe(0);
    expect(b.subscribers.size).toBe(0);
    expect(tracker.dependenciesOf("0")).toEqual([]);
  });

  it("should detach a forgotten source from its subscribers", () => {
    const a = source(1);
    const b = source(2);
    tracker.begin("0", component("0"));
    tracker.record(a);
    tracker.record(b);
    tracker.end("0");

    tracker.forget(a);

    expect(a.subscribers.size).toBe(0);
    expect(tracker.dependenciesOf("0")).toEqual([2]);
  });
});
