import { createStrataLogger, describeError, type StrataLogger } from "@strata-session/telemetry";

import type { RedisSessionCommands, RedisSessionSubscriber } from "./commands.js";
import type { RedisSessionRepository } from "./redis-session-repository.js";

export type KeyspaceConfigureAction = "notify" | "none";

export const EXPIRED_KEYEVENT_PATTERN = "__keyevent@*__:expired";

const NOTIFY_PARAMETER = "notify-keyspace-events";

/**
 * Flags missing from `current` for expired-key events to reach subscribers.
 * `A` is the alias that already covers `g` and `x`.
 */
export const missingKeyspaceFlags = (current: string): string[] =>
  ["E", "g", "x"].filter((flag) => !current.includes(flag) && !(flag !== "E" && current.includes("A")));

/**
 * Enables the keyspace notifications the expiration listener depends on.
 * Use `none` where CONFIG is disabled, e.g. on managed Redis offerings.
 */
export const configureKeyspaceNotifications = async (
  commands: RedisSessionCommands,
  action: KeyspaceConfigureAction,
  logger?: StrataLogger,
): Promise<void> => {
  if (action === "none") {
    return;
  }

  const current = (await commands.configGet(NOTIFY_PARAMETER)) ?? "";
  const missing = missingKeyspaceFlags(current);
  if (missing.length === 0) {
    return;
  }

  const next = `${current}${missing.join("")}`;
  await commands.configSet(NOTIFY_PARAMETER, next);
  logger?.info("session.redis.keyspace_configured", { previous: current, current: next });
};

export interface RedisKeyspaceExpirationListenerOptions {
  readonly subscriber: RedisSessionSubscriber;
  readonly repository: RedisSessionRepository;
  readonly logger?: StrataLogger;
}

/**
 * Turns expired shadow-key notifications into prompt session expiry. The
 * sweep still runs as a backstop because Redis pub/sub may drop messages.
 */
export class RedisKeyspaceExpirationListener {
  private readonly subscriber: RedisSessionSubscriber;
  private readonly repository: RedisSessionRepository;
  private readonly logger: StrataLogger;
  private readonly pending = new Set<Promise<void>>();
  private listening = false;

  constructor(options: RedisKeyspaceExpirationListenerOptions) {
    this.subscriber = options.subscriber;
    this.repository = options.repository;
    this.logger = options.logger ?? createStrataLogger({ name: "session-redis-keyspace" });
  }

  get isListening(): boolean {
    return this.listening;
  }

  async start(): Promise<void> {
    if (this.listening) {
      return;
    }
    await this.subscriber.pSubscribe(EXPIRED_KEYEVENT_PATTERN, (key) => this.onExpired(key));
    this.listening = true;
    this.logger.info("session.redis.keyspace_listening", { pattern: EXPIRED_KEYEVENT_PATTERN });
  }

  async stop(): Promise<void> {
    if (!this.listening) {
      return;
    }
    await this.subscriber.pUnsubscribe(EXPIRED_KEYEVENT_PATTERN);
    this.listening = false;
    await this.idle();
  }

  /**
   * Resolves once every notification received so far has been handled.
   */
  async idle(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private onExpired(key: string): void {
    const id = this.repository.keys.idFromShadow(key);
    if (id === undefined) {
      return;
    }
    const task = this.handle(id).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  private async handle(id: string): Promise<void> {
    try {
      const expired = await this.repository.handleShadowExpired(id);
      this.logger.debug("session.redis.shadow_expired", { sessionId: id, expired });
    } catch (error) {
      this.logger.error("session.redis.shadow_expired_failed", { sessionId: id, error: describeError(error) });
    }
  }
}
