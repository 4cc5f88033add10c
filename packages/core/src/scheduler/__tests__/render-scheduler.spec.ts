import { ReentrantUpdateError } from "tessera-shared";
import { RenderScheduler, type SchedulerHost, type SchedulerOptions } from "../render-scheduler";

/**
 * In-memory host: records renders and lets tests hook into them.
 */
function createHost() {
  const live = new Set<string>(["", "0", "0.1", "1"]);
  const rendered: string[] = [];
  let onRender: (key: string) => void = () => undefined;
  const host: SchedulerHost = {
    isLive: (key) => live.has(key),
    render: (key) => {
      rendered.push(key);
      onRender(key);
    },
    handleAsyncError: vi.fn(),
  };
  return {
    host,
    live,
    rendered,
    setOnRender: (fn: (key: string) => void) => {
      onRender = fn;
    },
  };
}

describe("RenderScheduler", () => {
  const manual: SchedulerOptions = { maxReentrantRounds: 10, autoFlush: "manual" };

  it("should move from idle to collecting and back", () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, manual);
    expect(scheduler.state).toBe("idle");

    expect(scheduler.enqueue("0")).toBe(true);
    expect(scheduler.enqueue("0")).toBe(false);
    expect(scheduler.state).toBe("collecting");
    expect(scheduler.pendingKeys).toEqual(["0"]);

    const result = scheduler.flush();

    expect(result).toEqual({ rounds: [["0"]], rendered: 1 });
    expect(rendered).toEqual(["0"]);
    expect(scheduler.state).toBe("idle");
  });

  it("should render each pending task once in insertion order", () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, manual);

    scheduler.enqueue("1");
    scheduler.enqueue("0");
    scheduler.enqueue("1");
    scheduler.flush();

    expect(rendered).toEqual(["1", "0"]);
  });

  it("should skip tasks whose ancestor is pending in the same round", () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, manual);

    scheduler.enqueue("0.1");
    scheduler.enqueue("0");
    scheduler.flush();

    expect(rendered).toEqual(["0"]);
  });

  it("should skip tasks for components that are no longer live", () => {
    const { host, rendered, live } = createHost();
    const scheduler = new RenderScheduler(host, manual);

    scheduler.enqueue("0.1");
    scheduler.enqueue("1");
    live.delete("1");
    const result = scheduler.flush();

    expect(rendered).toEqual(["0.1"]);
    expect(result.rendered).toBe(1);
  });

  it("should flush when the outermost batch ends", () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, manual);

    const value = scheduler.batch(() => {
      scheduler.enqueue("0");
      scheduler.batch(() => scheduler.enqueue("1"));
      expect(rendered).toEqual([]);
      expect(scheduler.inPhase).toBe(true);
      return 42;
    });

    expect(value).toBe(42);
    expect(rendered).toEqual(["0", "1"]);
    expect(scheduler.inPhase).toBe(false);
  });

  it("should drop pending tasks when a batch throws", () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, manual);

    expect(() =>
      scheduler.batch(() => {
        scheduler.enqueue("0");
        throw new Error("render failed");
      }),
    ).toThrow("render failed");

    expect(scheduler.state).toBe("idle");
    expect(scheduler.pendingKeys).toEqual([]);
    expect(rendered).toEqual([]);
  });

  it("should run writes made while flushing in the next round", () => {
    const { host, setOnRender } = createHost();
    const scheduler = new RenderScheduler(host, manual);
    setOnRender((key) => {
      if (key === "0") scheduler.enqueue("1");
    });

    scheduler.enqueue("0");
    const result = scheduler.flush();

    expect(result.rounds).toEqual([["0"], ["1"]]);
  });

  it("should fail after the maximum number of rounds", () => {
    const { host, setOnRender } = createHost();
    const scheduler = new RenderScheduler(host, { maxReentrantRounds: 3, autoFlush: "manual" });
    setOnRender((key) => scheduler.enqueue(key));

    scheduler.enqueue("0");

    let caught: unknown;
    try {
      scheduler.flush();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReentrantUpdateError);
    expect(caught).toMatchObject({
      code: "SCHEDULER_REENTRANT_OVERFLOW",
      chain: [["0"], ["0"], ["0"]],
    });
    expect(scheduler.state).toBe("idle");
    expect(scheduler.pendingKeys).toEqual([]);
  });

  it("should allow exactly the maximum number of rounds", () => {
    const { host, setOnRender } = createHost();
    const scheduler = new RenderScheduler(host, { maxReentrantRounds: 3, autoFlush: "manual" });
    let renders = 0;
    setOnRender((key) => {
      renders += 1;
      if (renders < 3) scheduler.enqueue(key);
    });

    scheduler.enqueue("0");

    expect(scheduler.flush().rounds).toHaveLength(3);
  });

  it("should flush on the next microtask in microtask mode", async () => {
    const { host, rendered } = createHost();
    const scheduler = new RenderScheduler(host, { maxReentrantRounds: 10, autoFlush: "microtask" });

    scheduler.enqueue("0");
    scheduler.enqueue("1");
    expect(rendered).toEqual([]);

    await Promise.resolve();

    expect(rendered).toEqual(["0", "1"]);
    expect(scheduler.state).toBe("idle");
  });

  it("should hand microtask flush errors to the host", async () => {
    const { host, setOnRender } = createHost();
    const scheduler = new RenderScheduler(host, { maxReentrantRounds: 10, autoFlush: "microtask" });
    const failure = new Error("render failed");
    setOnRender(() => {
      throw failure;
    });

    scheduler.enqueue("0");
    await Promise.resolve();

    expect(host.handleAsyncError).toHaveBeenCalledWith(failure);
  });

  it("should ignore tasks after close", () => {
    const { host } = createHost();
    const scheduler = new RenderScheduler(host, manual);
    scheduler.enqueue("0");

    scheduler.close();

    expect(scheduler.enqueue("1")).toBe(false);
    expect(scheduler.pendingKeys).toEqual([]);
    expect(scheduler.state).toBe("idle");
  });
});
