import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, createLogger, errorData, jsonOutput } from "./logger.js";
import type { LogEntry } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("logs at or above configured level", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("test", "info", (e) => entries.push(e));

    logger.debug("skip");
    logger.info("keep");
    logger.warn("keep");
    logger.error("keep");

    expect(entries.map((e) => e.level)).toEqual(["info", "warn", "error"]);
  });

  it("suppresses all logs at silent level", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("test", "silent", (e) => entries.push(e));

    logger.error("x");

    expect(entries).toHaveLength(0);
  });

  it("includes subsystem and data in entries", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger("cache", "debug", (e) => entries.push(e));
    logger.info("hit", { author: "alice", version: "1.0.0" });
    expect(entries[0]?.subsystem).toBe("cache");
    expect(entries[0]?.data).toEqual({ author: "alice", version: "1.0.0" });
    expect(new Date(entries[0]?.ts ?? "").getTime()).toBeGreaterThan(0);
  });

  it("creates child logger with prefixed subsystem", () => {
    const entries: LogEntry[] = [];
    const child = new Logger("toolcrate", "debug", (e) => entries.push(e)).child("loader");
    child.info("loading");
    expect(entries[0]?.subsystem).toBe("toolcrate:loader");
  });
});

describe("createLogger", () => {
  it("honours level option", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("test", { level: "warn", output: (e) => entries.push(e) });
    logger.info("skip");
    logger.warn("keep");
    expect(entries).toHaveLength(1);
  });

  it("writes one JSON line per entry in json format", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("json", { format: "json" });
    logger.info("hello");
    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toMatchObject({ level: "info", subsystem: "json", message: "hello" });
  });
});

describe("jsonOutput", () => {
  it("routes errors to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    jsonOutput({ level: "error", subsystem: "s", message: "boom", ts: "2026-01-01T00:00:00.000Z" });
    expect(spy).toHaveBeenCalledWith(
      '{"level":"error","subsystem":"s","message":"boom","ts":"2026-01-01T00:00:00.000Z"}',
    );
  });
});

describe("errorData", () => {
  it("describes errors with causes", () => {
    const err = new Error("outer", { cause: new Error("inner") });
    expect(errorData(err)).toEqual({ error: "outer", errorName: "Error", cause: "inner" });
  });

  it("stringifies non-errors", () => {
    expect(errorData("plain")).toEqual({ error: "plain" });
  });
});
