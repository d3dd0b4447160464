import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { PinoAppLogger, createLogger, isHumanFormat } from "../src/logger";
import type { TelemetryConfig } from "../src/env";

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
        .map((l): Record<string, unknown> => JSON.parse(l)),
  };
}

describe("PinoAppLogger", () => {
  it("should delegate info() to pino", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "debug" }, stream));

    logger.info("hello");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]?.msg).toBe("hello");
  });

  it("should pass attributes as fields of the record", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "debug" }, stream));

    logger.info("order created", { orderId: "123" });

    expect(lines()[0]).toMatchObject({ msg: "order created", orderId: "123" });
  });

  it("should delegate all log levels", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "debug" }, stream));

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines().map((l) => l.msg)).toEqual(["d", "i", "w", "e"]);
    expect(lines().map((l) => l.level)).toEqual([20, 30, 40, 50]);
  });

  it("should create a child logger with name field", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "debug" }, stream));

    logger.child("orders", { region: "eu-west-1" }).info("fetching");

    expect(lines()[0]).toMatchObject({ name: "orders", region: "eu-west-1", msg: "fetching" });
  });

  it("should create a context logger via withContext", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "debug" }, stream));

    logger.withContext({ requestId: "abc" }).info("handled");

    expect(lines()[0]).toMatchObject({ requestId: "abc", msg: "handled" });
  });

  it("should update level via setLevel", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "info" }, stream));

    logger.debug("should not appear");
    expect(lines()).toHaveLength(0);

    logger.setLevel("debug");
    logger.debug("now it appears");

    expect(lines().map((l) => l.msg)).toEqual(["now it appears"]);
  });

  it("should filter messages below the configured level", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoAppLogger(pino({ level: "warn" }, stream));

    logger.debug("skip");
    logger.info("skip");
    logger.warn("keep");
    logger.error("keep");

    expect(lines().map((l) => l.msg)).toEqual(["keep", "keep"]);
  });
});

describe("createLogger", () => {
  const baseConfig: TelemetryConfig = {
    serviceName: "test",
    logLevel: "info",
    logFormat: "json",
    logFilePath: null,
    platform: null,
    redactKeys: [],
  };

  it("should create a JSON logger", () => {
    expect(createLogger(baseConfig)).toBeInstanceOf(PinoAppLogger);
  });

  it("should accept redaction keys", () => {
    const config: TelemetryConfig = { ...baseConfig, redactKeys: ["password", "secret"] };

    expect(createLogger(config)).toBeInstanceOf(PinoAppLogger);
  });

  it("should not throw when creating with file output", () => {
    const config: TelemetryConfig = {
      ...baseConfig,
      logFilePath: join(tmpdir(), "argwire-test-log.json"),
    };

    expect(() => createLogger(config)).not.toThrow();
  });

  it("should not throw with human output", () => {
    const config: TelemetryConfig = { ...baseConfig, logFormat: "human" };

    expect(() => createLogger(config)).not.toThrow();
  });
});

describe("isHumanFormat", () => {
  const config: TelemetryConfig = {
    serviceName: "test",
    logLevel: "info",
    logFormat: "auto",
    logFilePath: null,
    platform: null,
    redactKeys: [],
  };

  it("should pick human output on a developer machine", () => {
    expect(isHumanFormat(config)).toBe(true);
    expect(isHumanFormat({ ...config, platform: "local" })).toBe(true);
  });

  it("should pick JSON output on a deployed platform", () => {
    expect(isHumanFormat({ ...config, platform: "kubernetes" })).toBe(false);
  });

  it("should honour an explicit format", () => {
    expect(isHumanFormat({ ...config, logFormat: "json" })).toBe(false);
    expect(isHumanFormat({ ...config, logFormat: "human", platform: "kubernetes" })).toBe(true);
  });
});
