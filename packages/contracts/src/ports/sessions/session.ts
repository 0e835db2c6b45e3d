/**
 * Server-side state for one client, keyed by an opaque id.
 *
 * Timestamps are epoch milliseconds. `maxInactiveInterval` is in milliseconds;
 * zero or a negative value means the session never expires.
 */
export interface Session {
  readonly id: string;
  readonly creationTime: number;
  readonly lastAccessedTime: number;
  readonly maxInactiveInterval: number;

  getAttribute<T = unknown>(name: string): T | undefined;
  getAttributeOrDefault<T>(name: string, defaultValue: T): T;
  getRequiredAttribute<T = unknown>(name: string): T;
  setAttribute(name: string, value: unknown): void;
  removeAttribute(name: string): void;
  getAttributeNames(): Set<string>;

  setLastAccessedTime(time: number): void;
  setMaxInactiveInterval(interval: number): void;

  /**
   * Assigns a fresh id, keeping every other piece of state. Callers must
   * propagate the returned id to the client-visible token.
   */
  changeSessionId(): string;
  isExpired(now?: number): boolean;
  equals(other: unknown): boolean;
}

export type SaveMode = "on_set_attribute" | "on_get_attribute" | "always";
