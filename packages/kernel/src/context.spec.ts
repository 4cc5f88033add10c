import { Context } from "./context";

describe("Kernel Context (ALS)", () => {
  it("should fill defaults on create", () => {
    const ctx = Context.create({ engineId: "test-engine" });

    expect(ctx.engineId).toBe("test-engine");
    expect(ctx.pass).toBe(0);
    expect(ctx.phase).toBe("idle");
    expect(ctx.metadata).toEqual({});
    expect(typeof ctx.traceId).toBe("string");
  });

  it("should return the value of synchronous functions", () => {
    const ctx = Context.create({ engineId: "sync" });

    const result = Context.run(ctx, () => Context.get().engineId);

    expect(result).toBe("sync");
  });

  it("should propagate context to nested async calls", async () => {
    const ctx = Context.create({ traceId: "test-trace" });

    await Context.run(ctx, async () => {
      expect(Context.get().traceId).toBe("test-trace");

      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(Context.get().traceId).toBe("test-trace");
    });
  });

  it("should isolate contexts", async () => {
    const ctx1 = Context.create({ traceId: "trace-1" });
    const ctx2 = Context.create({ traceId: "trace-2" });

    const p1 = Context.run(ctx1, async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return Context.get().traceId;
    });

    const p2 = Context.run(ctx2, async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return Context.get().traceId;
    });

    const [res1, res2] = await Promise.all([p1, p2]);

    expect(res1).toBe("trace-1");
    expect(res2).toBe("trace-2");
  });

  it("should inherit from the parent in child and fork", () => {
    const root = Context.create({ engineId: "parent", pass: 4 });

    Context.run(root, () => {
      const child = Context.child({ phase: "render", component: "0.1" });
      expect(child.engineId).toBe("parent");
      expect(child.pass).toBe(4);
      expect(child.phase).toBe("render");
      expect(child.metadata).toBe(root.metadata);

      const phase = Context.fork({ phase: "effects" }, () => Context.get().phase);
      expect(phase).toBe("effects");
      expect(Context.get().phase).toBe("idle");
    });
  });

  it("should create a root when there is no parent", () => {
    expect(Context.child({ engineId: "orphan" }).engineId).toBe("orphan");
  });

  it("should throw if accessed outside of context", () => {
    expect(() => Context.get()).toThrow("Context not found");
    expect(Context.tryGet()).toBeUndefined();
  });
});
