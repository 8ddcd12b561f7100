import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import { FormworkLoggerImpl, createLogger, useHumanFormat } from "../src/logger";
import type { LoggerConfig } from "../src/env";

/** Collect pino JSON output lines via a writable stream. */
function createCapture(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, cb) {
      chunks.push(chunk.toString());
      cb();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter(Boolean)
        .map((l) => JSON.parse(l) as Record<string, unknown>),
  };
}

describe("FormworkLoggerImpl", () => {
  it("should delegate info() to pino", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "debug" }, stream));

    logger.info("hello");
    expect(lines()).toHaveLength(1);
    expect(lines()[0]!.msg).toBe("hello");
  });

  it("should pass attributes as first argument to pino", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "debug" }, stream));

    logger.info("validation failed", { schema: "User", errorCount: 2 });
    const line = lines()[0]!;
    expect(line.msg).toBe("validation failed");
    expect(line.schema).toBe("User");
    expect(line.errorCount).toBe(2);
  });

  it("should delegate all log levels", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "debug" }, stream));

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines().map((l) => l.msg)).toEqual(["d", "i", "w", "e"]);
  });

  it("should create a child logger with name field", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "debug" }, stream));

    logger.child("compiler", { schema: "Order" }).info("compiled");

    const line = lines()[0]!;
    expect(line.name).toBe("compiler");
    expect(line.schema).toBe("Order");
    expect(line.msg).toBe("compiled");
  });

  it("should create a context logger via withContext", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "debug" }, stream));

    logger.withContext({ requestId: "req-1" }).info("validated");

    const line = lines()[0]!;
    expect(line.requestId).toBe("req-1");
    expect(line.msg).toBe("validated");
  });

  it("should update level via setLevel", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "info" }, stream));

    logger.debug("should not appear");
    expect(lines()).toHaveLength(0);

    logger.setLevel("debug");
    logger.debug("now it appears");
    expect(lines()).toHaveLength(1);
    expect(lines()[0]!.msg).toBe("now it appears");
  });

  it("should filter messages below the configured level", () => {
    const { stream, lines } = createCapture();
    const logger = new FormworkLoggerImpl(pino({ level: "warn" }, stream));

    logger.debug("skip");
    logger.info("skip");
    logger.warn("keep");
    logger.error("keep");

    expect(lines().map((l) => l.msg)).toEqual(["keep", "keep"]);
  });
});

describe("useHumanFormat", () => {
  const baseConfig: LoggerConfig = {
    logLevel: "info",
    logFormat: "auto",
    logFilePath: null,
    redactKeys: [],
    local: true,
  };

  it("should use human output for 'auto' on a local machine", () => {
    expect(useHumanFormat(baseConfig)).toBe(true);
  });

  it("should use JSON output for 'auto' outside local", () => {
    expect(useHumanFormat({ ...baseConfig, local: false })).toBe(false);
  });

  it("should honour an explicit format", () => {
    expect(useHumanFormat({ ...baseConfig, logFormat: "json" })).toBe(false);
    expect(useHumanFormat({ ...baseConfig, logFormat: "human", local: false })).toBe(true);
  });
});

describe("createLogger", () => {
  const jsonConfig: LoggerConfig = {
    logLevel: "info",
    logFormat: "json",
    logFilePath: null,
    redactKeys: [],
    local: false,
  };

  it("should create a logger that outputs JSON to stdout", () => {
    expect(createLogger(jsonConfig)).toBeInstanceOf(FormworkLoggerImpl);
  });

  it("should create a logger with redaction paths", () => {
    const logger = createLogger({ ...jsonConfig, redactKeys: ["password", "token"] });
    expect(logger).toBeInstanceOf(FormworkLoggerImpl);
  });
});
