import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, silentLogger } from "./logger.js";

// Capture stderr writes for assertions
function captureStderr() {
  const lines: string[] = [];
  const spy = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk));
    return true;
  });
  return {
    lines,
    parsed(i: number): Record<string, unknown> {
      return JSON.parse(lines[i] ?? "null");
    },
    restore() {
      spy.mockRestore();
    },
  };
}

describe("createLogger", () => {
  let capture: ReturnType<typeof captureStderr>;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    capture = captureStderr();
  });

  afterEach(() => {
    capture.restore();
    delete process.env.LOG_LEVEL;
  });

  it("writes one JSON line per entry", () => {
    createLogger("up-rail-client").info("hello");

    expect(capture.lines).toHaveLength(1);
    expect(capture.lines[0]?.endsWith("\n")).toBe(true);
    const entry = capture.parsed(0);
    expect(entry.level).toBe("info");
    expect(entry.service).toBe("up-rail-client");
    expect(entry.msg).toBe("hello");
    expect(entry.ts).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("merges base, child and call fields", () => {
    const log = createLogger("svc", { env: "test" }).child({ component: "auth" });
    log.warn("token rejected", { status: 401 });

    expect(capture.parsed(0)).toMatchObject({
      level: "warn",
      msg: "token rejected",
      env: "test",
      component: "auth",
      status: 401,
    });
  });

  it("drops debug at the default level", () => {
    createLogger("svc").debug("noise");
    expect(capture.lines).toHaveLength(0);
  });

  it("reads LOG_LEVEL from the environment", () => {
    process.env.LOG_LEVEL = "ERROR";
    const log = createLogger("svc");
    log.info("skipped");
    log.warn("skipped");
    log.error("kept");
    expect(capture.lines).toHaveLength(1);
    expect(capture.parsed(0).msg).toBe("kept");
  });

  it("prefers an explicit level over LOG_LEVEL", () => {
    process.env.LOG_LEVEL = "error";
    const log = createLogger("svc", {}, "debug").child({ component: "gateway" });
    log.debug("kept");
    expect(capture.parsed(0)).toMatchObject({ level: "debug", component: "gateway" });
  });

  it("silentLogger writes nothing", () => {
    silentLogger.child({ a: 1 }).error("nothing");
    expect(capture.lines).toHaveLength(0);
  });
});
