import type {
  ExpiringSessionRepository,
  IndexedSessionRepository,
  SessionIndexes,
  SessionSweepSummary,
} from "@strata-session/contracts";
import {
  MapSession,
  SessionCodec,
  createRepositoryTelemetry,
  epochMillis,
  initialSessionState,
  instrumentOperation,
  resolveSessionRepositoryOptions,
  type RepositoryTelemetryContext,
  type ResolvedSessionRepositoryOptions,
  type SessionRepositoryOptions,
} from "@strata-session/core";
import { describeError } from "@strata-session/telemetry";

export interface MemorySessionRepositoryOptions extends SessionRepositoryOptions {
  readonly codec?: SessionCodec;
}

const BACKEND = "memory";

const indexKey = (name: string, value: string): string => JSON.stringify([name, value]);

const addToIndex = (index: Map<string, Set<string>>, key: string, value: string): void => {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set();
    index.set(key, bucket);
  }
  bucket.add(value);
};

const removeFromIndex = (index: Map<string, Set<string>>, key: string, value: string): void => {
  const bucket = index.get(key);
  if (!bucket) {
    return;
  }
  bucket.delete(value);
  if (bucket.size === 0) {
    index.delete(key);
  }
};

/**
 * Process-local repository. Sessions are stored encoded, so every lookup
 * hands out an independent working copy and unsupported attribute values
 * fail at save time exactly as they would against a remote backend.
 */
export class MemorySessionRepository
  implements IndexedSessionRepository<MapSession>, ExpiringSessionRepository
{
  private readonly entries = new Map<string, string>();
  private readonly sessionIndexes = new Map<string, SessionIndexes>();
  private readonly indexBuckets = new Map<string, Set<string>>();
  private readonly options: ResolvedSessionRepositoryOptions;
  private readonly codec: SessionCodec;
  private readonly telemetry: RepositoryTelemetryContext;

  constructor(options: MemorySessionRepositoryOptions = {}) {
    this.options = resolveSessionRepositoryOptions(options);
    this.codec = options.codec ?? new SessionCodec();
    this.telemetry = createRepositoryTelemetry(BACKEND, options.telemetry);
  }

  get defaultMaxInactiveInterval(): number {
    return this.options.defaultMaxInactiveInterval;
  }

  get size(): number {
    return this.entries.size;
  }

  createSession(): MapSession {
    return new MapSession(
      initialSessionState(this.options.idGenerator, epochMillis(this.options.clock), this.defaultMaxInactiveInterval),
      { idGenerator: this.options.idGenerator, saveMode: this.options.saveMode },
    );
  }

  async save(session: MapSession): Promise<void> {
    await instrumentOperation(this.telemetry, BACKEND, "save", { "session.id": session.id }, async () => {
      if (!session.hasChanges()) {
        return;
      }

      if (!session.isNew && !this.entries.has(session.originalId)) {
        this.telemetry.logger.warn("session.save.skipped", {
          sessionId: session.originalId,
          reason: "session was deleted concurrently",
        });
        return;
      }

      const indexes = this.options.indexResolver.resolveIndexesFor(session);
      const payload = this.codec.encode(session.toState(), indexes);

      if (session.originalId !== session.id) {
        this.removeRecord(session.originalId);
      }
      this.entries.set(session.id, payload);
      this.replaceIndexes(session.id, indexes);

      const created = session.isNew;
      session.markPersisted();
      if (created) {
        this.publish("created", session);
      }
    });
  }

  async findById(id: string): Promise<MapSession | undefined> {
    return instrumentOperation(this.telemetry, BACKEND, "findById", { "session.id": id }, async () =>
      this.loadActive(id, epochMillis(this.options.clock)),
    );
  }

  async deleteById(id: string): Promise<void> {
    await instrumentOperation(this.telemetry, BACKEND, "deleteById", { "session.id": id }, async () => {
      const payload = this.entries.get(id);
      if (payload === undefined) {
        return;
      }
      this.removeRecord(id);
      this.publish("deleted", this.restore(payload));
    });
  }

  async findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<ReadonlyMap<string, MapSession>> {
    return instrumentOperation(
      this.telemetry,
      BACKEND,
      "findByIndexNameAndIndexValue",
      { "session.index_name": indexName },
      async () => {
        const now = epochMillis(this.options.clock);
        const candidates = [...(this.indexBuckets.get(indexKey(indexName, indexValue)) ?? [])];
        const sessions = new Map<string, MapSession>();
        for (const id of candidates) {
          const session = this.loadActive(id, now);
          if (session && this.sessionIndexes.get(id)?.[indexName] === indexValue) {
            sessions.set(id, session);
          }
        }
        return sessions;
      },
    );
  }

  async cleanUpExpiredSessions(now: number = epochMillis(this.options.clock)): Promise<SessionSweepSummary> {
    return instrumentOperation(this.telemetry, BACKEND, "cleanUpExpiredSessions", {}, async () => {
      let scanned = 0;
      let expired = 0;
      let failed = 0;

      for (const id of [...this.entries.keys()]) {
        scanned += 1;
        try {
          if (this.expireIfStale(id, now)) {
            expired += 1;
          }
        } catch (error) {
          failed += 1;
          this.telemetry.logger.error("session.sweep.entry_failed", { sessionId: id, error: describeError(error) });
        }
      }

      this.telemetry.metrics.sweepCounter.add(1, { backend: BACKEND });
      return { scanned, expired, failed } satisfies SessionSweepSummary;
    });
  }

  private loadActive(id: string, now: number): MapSession | undefined {
    const payload = this.entries.get(id);
    if (payload === undefined) {
      return undefined;
    }
    const session = this.restore(payload);
    if (session.isExpired(now)) {
      this.expire(id, session);
      return undefined;
    }
    return session;
  }

  private expireIfStale(id: string, now: number): boolean {
    const payload = this.entries.get(id);
    if (payload === undefined) {
      return false;
    }
    const session = this.restore(payload);
    if (!session.isExpired(now)) {
      return false;
    }
    this.expire(id, session);
    return true;
  }

  private expire(id: string, session: MapSession): void {
    this.removeRecord(id);
    this.telemetry.metrics.expiredCounter.add(1, { backend: BACKEND });
    this.publish("expired", session);
  }

  private restore(payload: string): MapSession {
    const { state } = this.codec.decode(payload);
    return new MapSession(state, {
      idGenerator: this.options.idGenerator,
      saveMode: this.options.saveMode,
      isNew: false,
    });
  }

  private removeRecord(id: string): void {
    this.entries.delete(id);
    this.replaceIndexes(id, {});
  }

  private replaceIndexes(id: string, indexes: SessionIndexes): void {
    const previous = this.sessionIndexes.get(id) ?? {};
    for (const [name, value] of Object.entries(previous)) {
      if (indexes[name] !== value) {
        removeFromIndex(this.indexBuckets, indexKey(name, value), id);
      }
    }
    for (const [name, value] of Object.entries(indexes)) {
      addToIndex(this.indexBuckets, indexKey(name, value), id);
    }

    if (Object.keys(indexes).length === 0) {
      this.sessionIndexes.delete(id);
    } else {
      this.sessionIndexes.set(id, { ...indexes });
    }
  }

  private publish(type: "created" | "deleted" | "expired", session: MapSession): void {
    this.options.eventPublisher?.publish({
      type,
      sessionId: session.id,
      occurredAt: epochMillis(this.options.clock),
      session,
    });
  }
}

export const createMemorySessionRepository = (
  options?: MemorySessionRepositoryOptions,
): MemorySessionRepository => new MemorySessionRepository(options);
