import type {
  SessionEvent,
  SessionEventHandler,
  SessionEventPublisher,
  SessionEventType,
} from "@strata-session/contracts";
import { createStrataLogger, describeError, type StrataLogger } from "@strata-session/telemetry";

export type SessionEventSubscription = SessionEventType | "*";

export interface SessionEventBusOptions {
  readonly logger?: StrataLogger;
}

/**
 * In-process observer registry for session lifecycle events.
 *
 * Handlers run in registration order. A handler that throws or rejects is
 * logged and does not affect the other handlers or the publishing operation.
 */
export class SessionEventBus implements SessionEventPublisher {
  private readonly handlers = new Map<SessionEventSubscription, Set<SessionEventHandler>>();
  private readonly logger: StrataLogger;

  constructor(options: SessionEventBusOptions = {}) {
    this.logger = options.logger ?? createStrataLogger({ name: "session-events" });
  }

  subscribe(type: SessionEventSubscription, handler: SessionEventHandler): () => void {
    let bucket = this.handlers.get(type);
    if (!bucket) {
      bucket = new Set();
      this.handlers.set(type, bucket);
    }
    bucket.add(handler);

    return () => {
      const current = this.handlers.get(type);
      if (!current) {
        return;
      }
      current.delete(handler);
      if (current.size === 0) {
        this.handlers.delete(type);
      }
    };
  }

  publish(event: SessionEvent): void {
    const targets = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get("*") ?? [])];
    for (const handler of targets) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.reportFailure(event, error));
        }
      } catch (error) {
        this.reportFailure(event, error);
      }
    }
  }

  listenerCount(type?: SessionEventSubscription): number {
    if (type) {
      return this.handlers.get(type)?.size ?? 0;
    }
    let total = 0;
    for (const bucket of this.handlers.values()) {
      total += bucket.size;
    }
    return total;
  }

  clear(): void {
    this.handlers.clear();
  }

  private reportFailure(event: SessionEvent, error: unknown): void {
    this.logger.error("session.event.handler_failed", {
      eventType: event.type,
      sessionId: event.sessionId,
      error: describeError(error),
    });
  }
}
