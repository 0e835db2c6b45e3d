import { describe, expect, it } from "vitest";

import { MissingAttributeError } from "@strata-session/contracts";

import {
  DEFAULT_MAX_INACTIVE_INTERVAL_MS,
  MapSession,
  SequentialSessionIdGenerator,
  initialSessionState,
  type MapSessionOptions,
} from "../src/index.js";

const T0 = 1_700_000_000_000;

const createSession = (options: MapSessionOptions = {}, maxInactiveInterval = DEFAULT_MAX_INACTIVE_INTERVAL_MS) => {
  const idGenerator = options.idGenerator ?? new SequentialSessionIdGenerator();
  return new MapSession(initialSessionState(idGenerator, T0, maxInactiveInterval), { ...options, idGenerator });
};

describe("MapSession", () => {
  it("starts with equal creation and access times", () => {
    const session = createSession();

    expect(session.id).toBe("1");
    expect(session.creationTime).toBe(T0);
    expect(session.lastAccessedTime).toBe(T0);
    expect(session.maxInactiveInterval).toBe(1_800_000);
    expect(session.isNew).toBe(true);
  });

  it("expires once the full interval has elapsed", () => {
    const session = createSession();

    expect(session.isExpired(T0 + 1_799_999)).toBe(false);
    expect(session.isExpired(T0 + 1_800_000)).toBe(true);
  });

  it("measures expiry from the last access", () => {
    const session = createSession({}, 1000);
    session.setLastAccessedTime(T0 + 500);

    expect(session.isExpired(T0 + 1499)).toBe(false);
    expect(session.isExpired(T0 + 1500)).toBe(true);
  });

  it("never expires with a zero or negative interval", () => {
    const zero = createSession({}, 0);
    const negative = createSession({}, -1);

    expect(zero.isExpired(T0 + 10 * DEFAULT_MAX_INACTIVE_INTERVAL_MS)).toBe(false);
    expect(negative.isExpired(Number.MAX_SAFE_INTEGER)).toBe(false);
  });

  it("treats null and undefined as removal", () => {
    const session = createSession();
    session.setAttribute("a", 1);
    session.setAttribute("b", 2);

    session.setAttribute("a", null);
    session.setAttribute("b", undefined);

    expect([...session.getAttributeNames()]).toEqual([]);
  });

  it("returns defaults and rejects missing required attributes", () => {
    const session = createSession();
    session.setAttribute("theme", "dark");

    expect(session.getAttributeOrDefault("theme", "light")).toBe("dark");
    expect(session.getAttributeOrDefault("locale", "en")).toBe("en");
    expect(session.getRequiredAttribute<string>("theme")).toBe("dark");
    expect(() => session.getRequiredAttribute("user")).toThrow(MissingAttributeError);
    expect(() => session.getRequiredAttribute("user")).toThrow("Required attribute 'user' is missing.");
  });

  it("hands out attribute names as a snapshot", () => {
    const session = createSession();
    session.setAttribute("a", 1);
    session.setAttribute("b", 2);

    const names = session.getAttributeNames();
    for (const name of names) {
      session.removeAttribute(name);
    }

    expect([...names]).toEqual(["a", "b"]);
    expect(session.getAttributeNames().size).toBe(0);
  });

  it("tracks the stored id across an id change", () => {
    const session = createSession();
    session.markPersisted();

    expect(session.changeSessionId()).toBe("2");
    expect(session.id).toBe("2");
    expect(session.originalId).toBe("1");
    expect(session.getPendingChanges().idChanged).toBe(true);

    session.markPersisted();

    expect(session.originalId).toBe("2");
    expect(session.hasChanges()).toBe(false);
  });

  it("compares by id", () => {
    const session = createSession();

    expect(session.equals({ id: "1" })).toBe(true);
    expect(session.equals({ id: "2" })).toBe(false);
    expect(session.equals(null)).toBe(false);
  });

  describe("save modes", () => {
    const persisted = (options: MapSessionOptions) => {
      const session = createSession(options);
      session.setAttribute("cart", ["sku-1"]);
      session.setAttribute("theme", "dark");
      session.markPersisted();
      return session;
    };

    it("on_set_attribute records writes only", () => {
      const session = persisted({ saveMode: "on_set_attribute" });
      session.getAttribute("cart");

      expect(session.hasChanges()).toBe(false);

      session.setAttribute("theme", "light");

      expect([...session.getPendingChanges().attributes]).toEqual([["theme", "light"]]);
    });

    it("on_get_attribute also records reads", () => {
      const session = persisted({ saveMode: "on_get_attribute" });
      session.getAttribute("cart");

      expect([...session.getPendingChanges().attributes]).toEqual([["cart", ["sku-1"]]]);
    });

    it("always writes every attribute", () => {
      const session = persisted({ saveMode: "always" });

      expect(session.hasChanges()).toBe(true);
      expect([...session.getPendingChanges().attributes.keys()]).toEqual(["cart", "theme"]);
    });

    it("reports removals as undefined", () => {
      const session = persisted({});
      session.removeAttribute("cart");
      session.removeAttribute("unknown");

      expect([...session.getPendingChanges().attributes]).toEqual([["cart", undefined]]);
    });

    it("does not mark attributes dirty when taking a snapshot", () => {
      const session = persisted({ saveMode: "on_get_attribute" });

      const state = session.toState();

      expect(state.attributes.get("cart")).toEqual(["sku-1"]);
      expect(session.hasChanges()).toBe(false);
    });
  });
});
