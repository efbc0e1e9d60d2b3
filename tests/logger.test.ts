import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel, silentLogger } from "../src/logger.js";
import type { LogSink } from "../src/logger.js";

const NOW = new Date("2024-01-15T10:30:45.000Z");

function createSink(): LogSink & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log: (line) => {
      out.push(line);
    },
    error: (line) => {
      err.push(line);
    },
  };
}

describe("createLogger", () => {
  it("should prefix lines with timestamp, level and name", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, now: () => NOW });

    logger.info("Status server listening on 0.0.0.0:9001");

    expect(sink.out).toEqual([
      "2024-01-15T10:30:45.000Z INFO  [bridge] Status server listening on 0.0.0.0:9001",
    ]);
  });

  it("should route warn and error to the error stream", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, now: () => NOW });

    logger.warn("slow");
    logger.error("failed");

    expect(sink.out).toEqual([]);
    expect(sink.err).toEqual([
      "2024-01-15T10:30:45.000Z WARN  [bridge] slow",
      "2024-01-15T10:30:45.000Z ERROR [bridge] failed",
    ]);
  });

  it("should drop messages below the configured level", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, level: "warn", now: () => NOW });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(sink.out).toEqual([]);
    expect(sink.err).toHaveLength(1);
  });

  it("should default to the info level", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, now: () => NOW });

    logger.debug("hidden");
    logger.info("shown");

    expect(sink.out).toEqual(["2024-01-15T10:30:45.000Z INFO  [bridge] shown"]);
  });

  it("should write debug lines when the level is debug", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, level: "debug", now: () => NOW });

    logger.debug("details");

    expect(sink.out).toEqual(["2024-01-15T10:30:45.000Z DEBUG [bridge] details"]);
  });

  it("should append extra arguments in util.format style", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: false, now: () => NOW });

    logger.warn("Malformed notification message:", ["TestApp", 0]);

    expect(sink.err).toEqual([
      "2024-01-15T10:30:45.000Z WARN  [bridge] Malformed notification message: [ 'TestApp', 0 ]",
    ]);
  });

  it("should colour the level tag when colour is enabled", () => {
    const sink = createSink();
    const logger = createLogger("bridge", { sink, color: true, now: () => NOW });

    logger.info("hello");

    expect(sink.out).toEqual(["2024-01-15T10:30:45.000Z \u001b[36mINFO \u001b[39m [bridge] hello"]);
  });
});

describe("isLogLevel", () => {
  it("should accept the known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("INFO")).toBe(false);
  });
});

describe("silentLogger", () => {
  it("should accept every level without output", () => {
    expect(() => {
      silentLogger.debug("a");
      silentLogger.info("b");
      silentLogger.warn("c");
      silentLogger.error("d", new Error("e"));
    }).not.toThrow();
  });
});
