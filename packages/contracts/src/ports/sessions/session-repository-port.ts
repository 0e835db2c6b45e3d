import type { Session } from "./session.js";

export interface SessionRepository<S extends Session = Session> {
  /**
   * Builds a new session with a generated id and the configured default
   * max-inactive-interval. Nothing is written until `save`.
   */
  createSession(): S;
  save(session: S): Promise<void>;
  /**
   * Resolves to `undefined` both for unknown ids and for expired sessions,
   * which are deleted as a side effect.
   */
  findById(id: string): Promise<S | undefined>;
  deleteById(id: string): Promise<void>;
}

export interface IndexedSessionRepository<S extends Session = Session> extends SessionRepository<S> {
  findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<ReadonlyMap<string, S>>;
}

export interface SessionSweepSummary {
  readonly scanned: number;
  readonly expired: number;
  readonly failed: number;
}

export interface ExpiringSessionRepository {
  readonly defaultMaxInactiveInterval: number;
  cleanUpExpiredSessions(now?: number): Promise<SessionSweepSummary>;
}
