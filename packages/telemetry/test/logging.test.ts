import { afterEach, describe, expect, it, vi } from "vitest";

import {
  consoleLogSink,
  createStrataLogger,
  describeError,
  isStrataLogLevel,
  type StrataLogLevel,
  type StrataLoggerOptions,
} from "../src/index.js";

const captureLogger = (options: StrataLoggerOptions = {}) => {
  const lines: Array<{ level: StrataLogLevel; line: string }> = [];
  const logger = createStrataLogger({
    now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    sink: (level, line) => {
      lines.push({ level, line });
    },
    ...options,
  });
  return { logger, lines };
};

describe("createStrataLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line per entry with the service name and context", () => {
    const { logger, lines } = captureLogger({ name: "sessions", fields: { region: "eu" } });

    logger.info("session.cleanup.completed", { expired: 2 });

    expect(lines).toEqual([
      {
        level: "info",
        line: '{"timestamp":"2024-01-02T03:04:05.000Z","level":"info","message":"session.cleanup.completed","service":"sessions","region":"eu","expired":2}',
      },
    ]);
  });

  it("drops entries below the configured level", () => {
    const { logger, lines } = captureLogger({ level: "warn" });

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept too");

    expect(lines.map((entry) => entry.level)).toEqual(["warn", "error"]);
  });

  it("merges child fields over the parent's", () => {
    const { logger, lines } = captureLogger({ name: "sessions" });

    logger
      .child({ backend: "redis", component: "a" })
      .child({ component: "keyspace" })
      .info("session.redis.keyspace_configured", { flags: "Egx" });

    expect(lines[0]?.line).toBe(
      '{"timestamp":"2024-01-02T03:04:05.000Z","level":"info","message":"session.redis.keyspace_configured","service":"sessions","backend":"redis","component":"keyspace","flags":"Egx"}',
    );
  });

  it("does not add a child's fields to its parent", () => {
    const { logger, lines } = captureLogger();

    logger.child({ component: "cleanup" });
    logger.info("session.runtime.started");

    expect(lines[0]?.line).toBe(
      '{"timestamp":"2024-01-02T03:04:05.000Z","level":"info","message":"session.runtime.started","service":"strata-session"}',
    );
  });
});

describe("consoleLogSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes each level to its console stream", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    consoleLogSink("debug", "d");
    consoleLogSink("info", "i");
    consoleLogSink("warn", "w");
    consoleLogSink("error", "e");

    expect(log.mock.calls).toEqual([["d"], ["i"]]);
    expect(warn.mock.calls).toEqual([["w"]]);
    expect(error.mock.calls).toEqual([["e"]]);
  });

  it("is the default sink", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createStrataLogger({ now: () => new Date(0) }).warn("session.save.skipped");

    expect(warn.mock.calls).toEqual([
      ['{"timestamp":"1970-01-01T00:00:00.000Z","level":"warn","message":"session.save.skipped","service":"strata-session"}'],
    ]);
  });
});

describe("isStrataLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isStrataLogLevel("warn")).toBe(true);
    expect(isStrataLogLevel("trace")).toBe(false);
    expect(isStrataLogLevel("toString")).toBe(false);
  });
});

describe("describeError", () => {
  it("prefers the error message", () => {
    expect(describeError(new Error("connection refused"))).toBe("connection refused");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});
