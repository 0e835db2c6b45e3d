import {
  InvalidArgumentError,
  type ExpiringSessionRepository,
  type SessionSweepSummary,
} from "@strata-session/contracts";
import { createStrataLogger, describeError, type StrataLogger } from "@strata-session/telemetry";
import cron, { type ScheduledTask } from "node-cron";

import { epochMillis, systemClock, type Clock } from "../clock.js";
import { longestCronGapSeconds } from "./cron-period.js";

export const DEFAULT_CLEANUP_CRON = "0 * * * * *";

export interface SessionCleanupSchedulerOptions {
  readonly repository: ExpiringSessionRepository;
  /**
   * Six-field cron expression (seconds first). Ignored when `intervalSeconds`
   * is set. Its longest gap between runs must not exceed the repository's
   * default max-inactive-interval.
   */
  readonly cron?: string;
  /**
   * Fixed sweep period. Must not exceed the repository's default
   * max-inactive-interval.
   */
  readonly intervalSeconds?: number;
  readonly logger?: StrataLogger;
  readonly clock?: Clock;
}

/**
 * Converts a sweep period into a cron expression. Periods must divide a
 * minute, or be whole minutes dividing an hour.
 */
export const intervalToCronExpression = (intervalSeconds: number): string => {
  if (!Number.isInteger(intervalSeconds) || intervalSeconds < 1) {
    throw new InvalidArgumentError("Cleanup interval must be a positive whole number of seconds.", {
      intervalSeconds,
    });
  }

  if (intervalSeconds < 60 && 60 % intervalSeconds === 0) {
    return intervalSeconds === 1 ? "* * * * * *" : `*/${intervalSeconds} * * * * *`;
  }

  if (intervalSeconds % 60 === 0) {
    const minutes = intervalSeconds / 60;
    if (minutes === 60) {
      return "0 0 * * * *";
    }
    if (minutes < 60 && 60 % minutes === 0) {
      return minutes === 1 ? "0 * * * * *" : `0 */${minutes} * * * *`;
    }
  }

  throw new InvalidArgumentError(
    "Cleanup interval must divide a minute or be a whole number of minutes dividing an hour.",
    { intervalSeconds },
  );
};

export class SessionCleanupScheduler {
  readonly expression: string;

  private readonly repository: ExpiringSessionRepository;
  private readonly logger: StrataLogger;
  private readonly clock: Clock;
  private task?: ScheduledTask;
  private inProgress = false;

  constructor(options: SessionCleanupSchedulerOptions) {
    this.repository = options.repository;
    this.logger = options.logger ?? createStrataLogger({ name: "session-cleanup" });
    this.clock = options.clock ?? systemClock;

    const maxInactive = this.repository.defaultMaxInactiveInterval;
    if (options.intervalSeconds !== undefined) {
      this.expression = intervalToCronExpression(options.intervalSeconds);
      if (maxInactive > 0 && options.intervalSeconds * 1000 > maxInactive) {
        throw new InvalidArgumentError(
          "Cleanup interval is coarser than the default max-inactive-interval.",
          { intervalSeconds: options.intervalSeconds, maxInactiveInterval: maxInactive },
        );
      }
    } else {
      this.expression = options.cron ?? DEFAULT_CLEANUP_CRON;
    }

    if (!cron.validate(this.expression)) {
      throw new InvalidArgumentError(`Invalid cleanup cron expression '${this.expression}'.`, {
        cron: this.expression,
      });
    }

    const longestGapSeconds = longestCronGapSeconds(this.expression);
    if (maxInactive > 0 && longestGapSeconds !== undefined && longestGapSeconds * 1000 > maxInactive) {
      throw new InvalidArgumentError("Cleanup schedule runs less often than the default max-inactive-interval.", {
        cron: this.expression,
        longestGapSeconds,
        maxInactiveInterval: maxInactive,
      });
    }
  }

  get isScheduled(): boolean {
    return this.task !== undefined;
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.logger.info("session.cleanup.scheduled", { cron: this.expression });
    this.task = cron.schedule(this.expression, () => {
      void this.runOnce();
    });
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = undefined;
    this.logger.info("session.cleanup.stopped", {});
  }

  /**
   * Runs one sweep. Resolves to `undefined` when a sweep is already running
   * or the sweep failed; failures are logged, never thrown.
   */
  async runOnce(): Promise<SessionSweepSummary | undefined> {
    if (this.inProgress) {
      this.logger.warn("session.cleanup.skipped", { reason: "previous sweep still running" });
      return undefined;
    }

    this.inProgress = true;
    try {
      const summary = await this.repository.cleanUpExpiredSessions(epochMillis(this.clock));
      this.logger.info("session.cleanup.completed", { ...summary });
      return summary;
    } catch (error) {
      this.logger.error("session.cleanup.failed", { error: describeError(error) });
      return undefined;
    } finally {
      this.inProgress = false;
    }
  }
}
