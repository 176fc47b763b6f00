import { describe, expect, it } from "vitest";
import { LogLevel, parseLogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: ConstructorParameters<typeof StructuredLogger>[0] = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ ...options, writer: (line) => lines.push(line) });
  const parsed = (index: number): Record<string, unknown> => JSON.parse(lines[index] ?? "null");
  return { lines, logger, parsed };
}

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const { logger, parsed } = capture();

    logger.info("session started", { sessionId: "S1" });

    const entry = parsed(0);
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("session started");
    expect(entry.sessionId).toBe("S1");
    expect(entry.time).toBeTypeOf("string");
  });

  it("respects log level filtering", () => {
    const { logger, lines } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("includes component name when set", () => {
    const { logger, parsed } = capture({ component: "delta-update-manager" });
    logger.info("test");
    expect(parsed(0).component).toBe("delta-update-manager");
  });

  it("serializes error objects with stack", () => {
    const { logger, parsed } = capture();

    logger.error("failed", { error: new Error("boom") });

    const entry = parsed(0);
    expect(entry.error).toBe("boom");
    expect(entry.errorStack).toContain("Error: boom");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const { logger, parsed } = capture({ component: "reaper" });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    const entry = parsed(0);
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("spoofed");
    expect(entry.component).toBe("reaper");
    expect(entry.time).not.toBe("fake");
  });

  it("survives circular references in ctx", () => {
    const { logger, lines, parsed } = capture();

    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;
    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    expect(parsed(0).msg).toBe("circular data");
    expect(parsed(0).serializationError).toBe(true);
  });

  it("child loggers share writer and level and merge bindings", () => {
    const { logger, lines, parsed } = capture({ level: LogLevel.INFO, bindings: { udid: "U1" } });
    const child = logger.child("xctest", { sessionId: "S1" });

    child.debug("hidden");
    child.info("visible", { test: "testA" });

    expect(lines).toHaveLength(1);
    expect(parsed(0)).toMatchObject({
      component: "xctest",
      udid: "U1",
      sessionId: "S1",
      test: "testA",
    });
  });
});

describe("parseLogLevel", () => {
  it("maps level names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("INFO")).toBe(LogLevel.INFO);
    expect(parseLogLevel(" warn ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("error")).toBe(LogLevel.ERROR);
  });

  it("returns undefined for unknown names", () => {
    expect(parseLogLevel("verbose")).toBeUndefined();
  });
});
