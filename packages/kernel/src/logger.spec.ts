import {
  Logger,
  composeContextFields,
  defaultContextFields,
  parseLogLevel,
  type DestinationStream,
} from "./logger";
import { Context, type KernelContext } from "./context";

function captureStream(): DestinationStream & { lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe("Logger", () => {
  beforeEach(() => {
    Logger.reset();
  });

  describe("basic logging", () => {
    it("should create a default logger", () => {
      const log = Logger.get();
      expect(typeof log.info).toBe("function");
      expect(typeof log.debug).toBe("function");
      expect(typeof log.warn).toBe("function");
      expect(typeof log.error).toBe("function");
    });

    it("should support message-first and object-first forms", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.get().info("plain message");
      Logger.get().warn({ identity: "0.1" }, "with object");

      expect(stream.lines).toHaveLength(2);
      expect(stream.lines[0].msg).toBe("plain message");
      expect(stream.lines[1]).toMatchObject({ identity: "0.1", msg: "with object", level: 40 });
    });
  });

  describe("configuration", () => {
    it("should configure log level", () => {
      Logger.configure({ level: "debug" });
      expect(Logger.level).toBe("debug");
    });

    it("should allow changing level at runtime", () => {
      Logger.configure({ level: "info" });
      Logger.setLevel("debug");
      expect(Logger.level).toBe("debug");
    });

    it("should check if level is enabled", () => {
      Logger.configure({ level: "info" });

      expect(Logger.isLevelEnabled("info")).toBe(true);
      expect(Logger.isLevelEnabled("error")).toBe(true);
      expect(Logger.isLevelEnabled("debug")).toBe(false);
      expect(Logger.isLevelEnabled("trace")).toBe(false);
    });

    it("should fall back to TESSERA_LOG_LEVEL", () => {
      vi.stubEnv("TESSERA_LOG_LEVEL", "warn");
      try {
        expect(Logger.level).toBe("warn");
      } finally {
        vi.unstubAllEnvs();
      }
    });

    it("should ignore unknown levels in the environment", () => {
      vi.stubEnv("TESSERA_LOG_LEVEL", "loud");
      try {
        expect(Logger.level).toBe("info");
      } finally {
        vi.unstubAllEnvs();
      }
    });
  });

  describe("parseLogLevel", () => {
    it("should narrow known levels", () => {
      expect(parseLogLevel("silent")).toBe("silent");
      expect(parseLogLevel("verbose")).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe("child loggers", () => {
    it("should bind the component name", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.for("RenderScheduler").info("flushing");

      expect(stream.lines[0]).toMatchObject({ component: "RenderScheduler", msg: "flushing" });
    });

    it("should use the constructor name of objects", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });
      class LifecycleSweeper {}

      Logger.for(new LifecycleSweeper()).info("sweeping");

      expect(stream.lines[0].component).toBe("LifecycleSweeper");
    });

    it("should follow a configure() made after the logger was created", () => {
      const log = Logger.for("Early");
      const stream = captureStream();
      Logger.configure({ destination: stream });

      log.info("after configure");

      expect(stream.lines).toEqual([
        expect.objectContaining({ component: "Early", msg: "after configure" }),
      ]);
    });

    it("should chain child bindings", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.for("Component").child({ operation: "test" }).info("chained");

      expect(stream.lines[0]).toMatchObject({ component: "Component", operation: "test" });
    });
  });

  describe("context integration", () => {
    it("should omit context fields outside of context", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });

      Logger.get().info("No context");

      expect(stream.lines[0].engine_id).toBeUndefined();
    });

    it("should inject engine context fields when available", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream });
      const ctx = Context.create({
        engineId: "test-engine",
        traceId: "trace-1",
        pass: 2,
        phase: "render",
        component: "0.1",
      });

      Context.run(ctx, () => Logger.get().info("With context"));

      expect(stream.lines[0]).toMatchObject({
        engine_id: "test-engine",
        trace_id: "trace-1",
        pass: 2,
        phase: "render",
        component_id: "0.1",
      });
    });

    it("should skip context when includeContext is false", () => {
      const stream = captureStream();
      Logger.configure({ destination: stream, includeContext: false });

      Context.run(Context.create({ engineId: "hidden" }), () => Logger.get().info("x"));

      expect(stream.lines[0].engine_id).toBeUndefined();
    });

    it("should compose a custom extractor after the defaults", () => {
      const stream = captureStream();
      Logger.configure({
        destination: stream,
        contextFields: (ctx) => ({ session: ctx.metadata.session }),
      });
      const ctx = Context.create({ engineId: "e1", metadata: { session: "s-1" } });

      Context.run(ctx, () => Logger.get().info("custom"));

      expect(stream.lines[0]).toMatchObject({ engine_id: "e1", session: "s-1" });
    });
  });

  describe("standalone logger", () => {
    it("should create standalone logger with custom config", () => {
      const log = Logger.create({ level: "warn" });
      expect(log.isLevelEnabled("warn")).toBe(true);
      expect(log.isLevelEnabled("info")).toBe(false);
    });

    it("should not affect global logger", () => {
      Logger.configure({ level: "info" });
      const standalone = Logger.create({ level: "error" });

      expect(Logger.level).toBe("info");
      expect(standalone.level).toBe("error");
    });
  });

  describe("reset", () => {
    it("should reset global logger", () => {
      Logger.configure({ level: "debug" });
      Logger.reset();
      expect(Logger.level).toBe("info");
    });
  });

  describe("composeContextFields", () => {
    const ctx: KernelContext = {
      engineId: "engine-1",
      traceId: "trace-1",
      pass: 1,
      phase: "flush",
      metadata: { custom_field: "custom_value" },
    };

    it("should compose multiple extractors", () => {
      const composed = composeContextFields(defaultContextFields, (c) => ({
        custom: c.metadata.custom_field,
      }));

      expect(composed(ctx)).toEqual({
        engine_id: "engine-1",
        trace_id: "trace-1",
        pass: 1,
        phase: "flush",
        custom: "custom_value",
      });
    });

    it("should allow later extractors to override earlier ones", () => {
      const composed = composeContextFields(
        () => ({ key: "original" }),
        () => ({ key: "overridden" }),
      );

      expect(composed(ctx).key).toBe("overridden");
    });

    it("should print the root component as <root>", () => {
      expect(defaultContextFields({ ...ctx, component: "" }).component_id).toBe("<root>");
    });
  });
});
