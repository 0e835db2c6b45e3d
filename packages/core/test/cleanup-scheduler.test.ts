import { afterEach, describe, expect, it, vi } from "vitest";

import { InvalidArgumentError, type ExpiringSessionRepository, type SessionSweepSummary } from "@strata-session/contracts";
import type { StrataLogger } from "@strata-session/telemetry";

import {
  SessionCleanupScheduler,
  intervalToCronExpression,
  longestCronGapSeconds,
  type Clock,
} from "../src/index.js";

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  return {
    stop,
    schedule: vi.fn((expression: string, task: () => void) => ({ expression, task, stop })),
    validate: vi.fn((expression: string) => expression.length > 0),
  };
});

vi.mock("node-cron", () => ({
  default: { schedule: cronMock.schedule, validate: cronMock.validate },
}));

const createLogger = () => {
  const logger: StrataLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

const summary: SessionSweepSummary = { scanned: 4, expired: 3, failed: 1 };

const createRepository = (sweep: (now?: number) => Promise<SessionSweepSummary> = async () => summary) => {
  const repository = {
    defaultMaxInactiveInterval: 1_800_000,
    cleanUpExpiredSessions: vi.fn(sweep),
  } satisfies ExpiringSessionRepository;
  return repository;
};

const clock: Clock = { now: () => new Date(5_000) };

describe("intervalToCronExpression", () => {
  it.each([
    [1, "* * * * * *"],
    [15, "*/15 * * * * *"],
    [60, "0 * * * * *"],
    [300, "0 */5 * * * *"],
    [3600, "0 0 * * * *"],
  ])("maps %i seconds to %s", (seconds, expression) => {
    expect(intervalToCronExpression(seconds)).toBe(expression);
  });

  it.each([0, 7, 90, 1.5])("rejects %s seconds", (seconds) => {
    expect(() => intervalToCronExpression(seconds)).toThrow(InvalidArgumentError);
  });
});

describe("longestCronGapSeconds", () => {
  it.each([
    ["*/10 * * * * *", 10],
    ["5,10 * * * * *", 55],
    ["0 * * * * *", 60],
    ["*/15 * * * *", 900],
    ["0 0 * * * *", 3600],
    ["0 0 0-23/6 * * *", 21_600],
    ["0 30 2 * * *", 86_400],
    ["0 0 * * * 1-5", 86_400],
  ])("measures %s as %i seconds", (expression, seconds) => {
    expect(longestCronGapSeconds(expression)).toBe(seconds);
  });

  it.each(["a * * * * *", "* * * *", "0 70 * * * *"])("does not measure %s", (expression) => {
    expect(longestCronGapSeconds(expression)).toBeUndefined();
  });
});

describe("SessionCleanupScheduler", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("derives the expression from a fixed interval", () => {
    const scheduler = new SessionCleanupScheduler({ repository: createRepository(), intervalSeconds: 30 });

    expect(scheduler.expression).toBe("*/30 * * * * *");
  });

  it("rejects an interval coarser than the session lifetime", () => {
    expect(() => new SessionCleanupScheduler({ repository: createRepository(), intervalSeconds: 3600 })).toThrow(
      "Cleanup interval is coarser than the default max-inactive-interval.",
    );
  });

  it("rejects a cron expression that runs less often than the session lifetime", () => {
    const attempt = () => new SessionCleanupScheduler({ repository: createRepository(), cron: "0 0 * * * *" });

    expect(attempt).toThrow(InvalidArgumentError);
    expect(attempt).toThrow("Cleanup schedule runs less often than the default max-inactive-interval.");
  });

  it("accepts a cron expression whose gaps fit the session lifetime", () => {
    const scheduler = new SessionCleanupScheduler({ repository: createRepository(), cron: "0 */30 * * * *" });

    expect(scheduler.expression).toBe("0 */30 * * * *");
  });

  it("does not bound the schedule of sessions that never expire", () => {
    const repository = { ...createRepository(), defaultMaxInactiveInterval: 0 };

    expect(new SessionCleanupScheduler({ repository, cron: "0 0 3 * * *" }).expression).toBe("0 0 3 * * *");
  });

  it("rejects an invalid cron expression", () => {
    cronMock.validate.mockReturnValueOnce(false);

    expect(() => new SessionCleanupScheduler({ repository: createRepository(), cron: "whenever" })).toThrow(
      "Invalid cleanup cron expression 'whenever'.",
    );
  });

  it("schedules once and stops the task", async () => {
    const repository = createRepository();
    const scheduler = new SessionCleanupScheduler({ repository, clock, logger: createLogger() });

    scheduler.start();
    scheduler.start();

    expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    const call = cronMock.schedule.mock.calls[0];
    expect(call?.[0]).toBe("0 * * * * *");
    expect(scheduler.isScheduled).toBe(true);

    call?.[1]();
    await vi.waitFor(() => expect(repository.cleanUpExpiredSessions).toHaveBeenCalledWith(5_000));

    scheduler.stop();

    expect(cronMock.stop).toHaveBeenCalledTimes(1);
    expect(scheduler.isScheduled).toBe(false);
  });

  it("returns and logs the sweep summary", async () => {
    const logger = createLogger();
    const scheduler = new SessionCleanupScheduler({ repository: createRepository(), clock, logger });

    await expect(scheduler.runOnce()).resolves.toEqual(summary);
    expect(logger.info).toHaveBeenCalledWith("session.cleanup.completed", { scanned: 4, expired: 3, failed: 1 });
  });

  it("logs a failed sweep instead of throwing", async () => {
    const logger = createLogger();
    const repository = createRepository(async () => {
      throw new Error("database down");
    });
    const scheduler = new SessionCleanupScheduler({ repository, clock, logger });

    await expect(scheduler.runOnce()).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith("session.cleanup.failed", { error: "database down" });
  });

  it("skips a run while the previous one is still in progress", async () => {
    const logger = createLogger();
    let finish: (value: SessionSweepSummary) => void = () => undefined;
    const repository = createRepository(
      () =>
        new Promise<SessionSweepSummary>((resolve) => {
          finish = resolve;
        }),
    );
    const scheduler = new SessionCleanupScheduler({ repository, clock, logger });

    const first = scheduler.runOnce();
    const second = await scheduler.runOnce();
    finish(summary);

    expect(second).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("session.cleanup.skipped", { reason: "previous sweep still running" });
    await expect(first).resolves.toEqual(summary);
    expect(repository.cleanUpExpiredSessions).toHaveBeenCalledTimes(1);
  });
});
