import { describe, expect, it } from "vitest";
import { LogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: ConstructorParameters<typeof StructuredLogger>[0] = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ ...options, writer: (line) => lines.push(line) });
  return { lines, logger };
}

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const { lines, logger } = capture();

    logger.info("transition committed", { to: "moderation" });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("transition committed");
    expect(parsed.to).toBe("moderation");
    expect(parsed.time).toBeTypeOf("string");
  });

  it("respects log level filtering", () => {
    const { lines, logger } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("includes component name when set", () => {
    const { lines, logger } = capture({ component: "lifecycle-engine" });

    logger.info("test");

    expect(JSON.parse(lines[0]).component).toBe("lifecycle-engine");
  });

  it("serializes error objects with stack", () => {
    const { lines, logger } = capture();

    logger.error("hook failed", { error: new Error("boom") });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.error).toBe("boom");
    expect(parsed.errorStack).toContain("Error: boom");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const { lines, logger } = capture({ component: "test" });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("spoofed");
    expect(parsed.component).toBe("test");
    expect(parsed.time).not.toBe("fake");
  });

  it("child loggers share the writer and carry bindings", () => {
    const { lines, logger } = capture({ bindings: { app: "cms" } });

    logger.child("article", { entityKind: "article" }).warn("lost race", { attempts: 1 });

    expect(JSON.parse(lines[0])).toMatchObject({
      level: "warn",
      msg: "lost race",
      component: "article",
      app: "cms",
      entityKind: "article",
      attempts: 1,
    });
  });

  it("ctx fields win over bindings with the same key", () => {
    const { lines, logger } = capture({ bindings: { entityId: "default" } });

    logger.info("x", { entityId: "article-7" });

    expect(JSON.parse(lines[0]).entityId).toBe("article-7");
  });

  it("survives circular references in ctx", () => {
    const { lines, logger } = capture();

    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.msg).toBe("circular data");
    expect(parsed.serializationError).toBe(true);
  });
});
