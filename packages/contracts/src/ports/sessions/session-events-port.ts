import type { Session } from "./session.js";

export type SessionEventType = "created" | "deleted" | "expired";

export interface SessionEvent {
  readonly type: SessionEventType;
  readonly sessionId: string;
  readonly occurredAt: number;
  /**
   * Last known state. Absent when the backend could no longer read it,
   * e.g. a keyspace notification for a record that is already gone.
   */
  readonly session?: Session;
}

export type SessionEventHandler = (event: SessionEvent) => void | Promise<void>;

export interface SessionEventPublisher {
  publish(event: SessionEvent): void;
}
