import { describe, expect, it, vi } from "vitest";

import type { SessionEvent } from "@strata-session/contracts";
import type { StrataLogger } from "@strata-session/telemetry";

import { SessionEventBus } from "../src/index.js";

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

const event = (type: SessionEvent["type"], sessionId = "s-1"): SessionEvent => ({
  type,
  sessionId,
  occurredAt: 1000,
});

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("SessionEventBus", () => {
  it("delivers to typed handlers before wildcard handlers", () => {
    const bus = new SessionEventBus({ logger: createLogger() });
    const received: string[] = [];
    bus.subscribe("*", (e) => {
      received.push(`any:${e.type}`);
    });
    bus.subscribe("created", (e) => {
      received.push(`created:${e.sessionId}`);
    });
    bus.subscribe("deleted", () => {
      received.push("deleted");
    });

    bus.publish(event("created"));

    expect(received).toEqual(["created:s-1", "any:created"]);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new SessionEventBus({ logger: createLogger() });
    const handler = vi.fn();
    const unsubscribe = bus.subscribe("expired", handler);

    unsubscribe();
    bus.publish(event("expired"));

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount("expired")).toBe(0);
  });

  it("isolates a throwing handler", () => {
    const logger = createLogger();
    const bus = new SessionEventBus({ logger });
    const after = vi.fn();
    bus.subscribe("deleted", () => {
      throw new Error("boom");
    });
    bus.subscribe("deleted", after);

    expect(() => bus.publish(event("deleted"))).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("session.event.handler_failed", {
      eventType: "deleted",
      sessionId: "s-1",
      error: "boom",
    });
  });

  it("logs rejected async handlers", async () => {
    const logger = createLogger();
    const bus = new SessionEventBus({ logger });
    bus.subscribe("created", async () => {
      throw new Error("async boom");
    });

    bus.publish(event("created", "s-9"));
    await flush();

    expect(logger.error).toHaveBeenCalledWith("session.event.handler_failed", {
      eventType: "created",
      sessionId: "s-9",
      error: "async boom",
    });
  });

  it("counts and clears handlers", () => {
    const bus = new SessionEventBus({ logger: createLogger() });
    bus.subscribe("created", vi.fn());
    bus.subscribe("*", vi.fn());

    expect(bus.listenerCount()).toBe(2);
    expect(bus.listenerCount("created")).toBe(1);

    bus.clear();

    expect(bus.listenerCount()).toBe(0);
  });
});
