import {
  toStorageUnavailable,
  type ExpiringSessionRepository,
  type IndexedSessionRepository,
  type SessionIndexes,
  type SessionSweepSummary,
} from "@strata-session/contracts";
import {
  MapSession,
  SessionCodec,
  createRepositoryTelemetry,
  epochMillis,
  initialSessionState,
  instrumentOperation,
  resolveSessionRepositoryOptions,
  type DecodedSession,
  type RepositoryTelemetryContext,
  type ResolvedSessionRepositoryOptions,
  type SessionRepositoryOptions,
} from "@strata-session/core";
import { describeError } from "@strata-session/telemetry";

import type { RedisSessionCommands } from "./commands.js";
import { EXPIRY_GRACE_MS, RedisSessionKeys } from "./keys.js";

export interface RedisSessionRepositoryOptions extends SessionRepositoryOptions {
  readonly commands: RedisSessionCommands;
  readonly namespace?: string;
  readonly codec?: SessionCodec;
}

const BACKEND = "redis";

/**
 * One encoded value per session under `<ns>:sessions:<id>`, with index
 * membership kept in plain sets. Expiry is enforced three ways: the data
 * key's own TTL, the keyspace listener reacting to shadow keys, and the
 * sorted-set sweep.
 */
export class RedisSessionRepository implements IndexedSessionRepository<MapSession>, ExpiringSessionRepository {
  readonly keys: RedisSessionKeys;
  private readonly commands: RedisSessionCommands;
  private readonly options: ResolvedSessionRepositoryOptions;
  private readonly codec: SessionCodec;
  private readonly telemetry: RepositoryTelemetryContext;

  constructor(options: RedisSessionRepositoryOptions) {
    this.options = resolveSessionRepositoryOptions(options);
    this.commands = options.commands;
    this.keys = new RedisSessionKeys(options.namespace);
    this.codec = options.codec ?? new SessionCodec();
    this.telemetry = createRepositoryTelemetry(BACKEND, options.telemetry);
  }

  get defaultMaxInactiveInterval(): number {
    return this.options.defaultMaxInactiveInterval;
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

      const indexes = this.options.indexResolver.resolveIndexesFor(session);
      const state = session.toState();
      const payload = this.codec.encode(state, indexes);
      const created = session.isNew;

      const persisted = await this.guard("save", { sessionId: session.id }, async () => {
        const renamed = !created && session.originalId !== session.id;
        if (renamed && !(await this.removeRecord(session.originalId))) {
          return false;
        }

        const ttl = state.maxInactiveInterval > 0 ? state.maxInactiveInterval + EXPIRY_GRACE_MS : undefined;
        const dataKey = this.keys.session(state.id);
        if (created || renamed) {
          await this.commands.set(dataKey, payload, { px: ttl });
        } else if (!(await this.commands.set(dataKey, payload, { px: ttl, xx: true }))) {
          return false;
        }

        await this.writeExpiry(state.id, state.lastAccessedTime, state.maxInactiveInterval);
        await this.replaceIndexes(state.id, indexes, ttl);
        return true;
      });

      if (!persisted) {
        this.telemetry.logger.warn("session.save.skipped", {
          sessionId: session.originalId,
          reason: "session was deleted concurrently",
        });
        return;
      }

      session.markPersisted();
      if (created) {
        this.publish("created", session.id, session);
      }
    });
  }

  async findById(id: string): Promise<MapSession | undefined> {
    return instrumentOperation(this.telemetry, BACKEND, "findById", { "session.id": id }, async () => {
      const decoded = await this.read(id);
      if (!decoded) {
        return undefined;
      }
      const session = this.restore(decoded);
      const now = epochMillis(this.options.clock);
      if (session.isExpired(now)) {
        await this.expire(id, now);
        return undefined;
      }
      return session;
    });
  }

  async deleteById(id: string): Promise<void> {
    await instrumentOperation(this.telemetry, BACKEND, "deleteById", { "session.id": id }, async () => {
      const decoded = await this.read(id);
      if (!decoded) {
        return;
      }
      const removed = await this.guard("deleteById", { sessionId: id }, () => this.removeRecord(id));
      if (removed) {
        this.publish("deleted", id, this.restore(decoded));
      }
    });
  }

  async findByIndexNameAndIndexValue(indexName: string, indexValue: string): Promise<ReadonlyMap<string, MapSession>> {
    return instrumentOperation(
      this.telemetry,
      BACKEND,
      "findByIndexNameAndIndexValue",
      { "session.index_name": indexName },
      async () => {
        const indexKey = this.keys.index(indexName, indexValue);
        const ids = await this.guard("findByIndexNameAndIndexValue", { indexName }, () =>
          this.commands.sMembers(indexKey),
        );
        const now = epochMillis(this.options.clock);
        const sessions = new Map<string, MapSession>();

        for (const id of ids) {
          const decoded = await this.read(id);
          if (!decoded || decoded.indexes[indexName] !== indexValue) {
            await this.guard("findByIndexNameAndIndexValue", { indexName }, () => this.commands.sRem(indexKey, [id]));
            continue;
          }
          const session = this.restore(decoded);
          if (session.isExpired(now)) {
            await this.expire(id, now);
            continue;
          }
          sessions.set(id, session);
        }
        return sessions;
      },
    );
  }

  async cleanUpExpiredSessions(now: number = epochMillis(this.options.clock)): Promise<SessionSweepSummary> {
    return instrumentOperation(this.telemetry, BACKEND, "cleanUpExpiredSessions", {}, async () => {
      const ids = await this.guard("cleanUpExpiredSessions", {}, () =>
        this.commands.zRangeByScore(this.keys.expirations, 0, now),
      );

      let expired = 0;
      let failed = 0;
      for (const id of ids) {
        try {
          if (await this.sweepOne(id, now)) {
            expired += 1;
          }
        } catch (error) {
          failed += 1;
          this.telemetry.logger.error("session.sweep.entry_failed", { sessionId: id, error: describeError(error) });
        }
      }

      this.telemetry.metrics.sweepCounter.add(1, { backend: BACKEND });
      return { scanned: ids.length, expired, failed } satisfies SessionSweepSummary;
    });
  }

  /**
   * Reacts to the shadow key of `id` expiring. Resolves `true` when the
   * session was removed here.
   */
  async handleShadowExpired(id: string): Promise<boolean> {
    return instrumentOperation(this.telemetry, BACKEND, "handleShadowExpired", { "session.id": id }, async () => {
      const decoded = await this.read(id);
      if (!decoded) {
        await this.guard("handleShadowExpired", { sessionId: id }, () => this.removeRecord(id));
        return false;
      }
      const now = epochMillis(this.options.clock);
      if (!this.restore(decoded).isExpired(now)) {
        return false;
      }
      return this.expire(id, now);
    });
  }

  private async sweepOne(id: string, now: number): Promise<boolean> {
    const decoded = await this.read(id);
    if (!decoded) {
      await this.removeRecord(id);
      return false;
    }
    const session = this.restore(decoded);
    if (session.isExpired(now)) {
      return this.expire(id, now);
    }
    await this.writeExpiry(id, session.lastAccessedTime, session.maxInactiveInterval);
    return false;
  }

  private async read(id: string): Promise<DecodedSession | undefined> {
    const payload = await this.guard("read", { sessionId: id }, () => this.commands.get(this.keys.session(id)));
    return payload === null ? undefined : this.codec.decode(payload);
  }

  /**
   * Removes `id` if the stored record is still expired at `now`. The record
   * is read again first so a save that landed after the caller's read keeps
   * the session.
   */
  private async expire(id: string, now: number): Promise<boolean> {
    const current = await this.read(id);
    if (!current) {
      return false;
    }
    const session = this.restore(current);
    if (!session.isExpired(now)) {
      return false;
    }
    const removed = await this.guard("expire", { sessionId: id }, () => this.removeRecord(id));
    if (removed) {
      this.telemetry.metrics.expiredCounter.add(1, { backend: BACKEND });
      this.publish("expired", id, session);
    }
    return removed;
  }

  /**
   * Drops every key belonging to `id`. Resolves whether the data key existed.
   */
  private async removeRecord(id: string): Promise<boolean> {
    const memberships = await this.commands.sMembers(this.keys.sessionIndexes(id));
    for (const indexKey of memberships) {
      await this.commands.sRem(indexKey, [id]);
    }
    const removed = await this.commands.del([this.keys.session(id)]);
    await this.commands.del([this.keys.shadow(id), this.keys.sessionIndexes(id)]);
    await this.commands.zRem(this.keys.expirations, [id]);
    return removed > 0;
  }

  private async writeExpiry(id: string, lastAccessedTime: number, maxInactiveInterval: number): Promise<void> {
    if (maxInactiveInterval <= 0) {
      await this.commands.del([this.keys.shadow(id)]);
      await this.commands.zRem(this.keys.expirations, [id]);
      return;
    }
    await this.commands.set(this.keys.shadow(id), "", { px: maxInactiveInterval });
    await this.commands.zAdd(this.keys.expirations, lastAccessedTime + maxInactiveInterval, id);
  }

  private async replaceIndexes(id: string, indexes: SessionIndexes, ttl: number | undefined): Promise<void> {
    const membershipKey = this.keys.sessionIndexes(id);
    const previous = new Set(await this.commands.sMembers(membershipKey));
    const desired = new Set(Object.entries(indexes).map(([name, value]) => this.keys.index(name, value)));

    for (const indexKey of previous) {
      if (!desired.has(indexKey)) {
        await this.commands.sRem(indexKey, [id]);
      }
    }
    for (const indexKey of desired) {
      if (!previous.has(indexKey)) {
        await this.commands.sAdd(indexKey, [id]);
      }
    }

    await this.commands.del([membershipKey]);
    if (desired.size > 0) {
      await this.commands.sAdd(membershipKey, [...desired]);
      if (ttl !== undefined) {
        await this.commands.pExpire(membershipKey, ttl);
      }
    }
  }

  private restore(decoded: DecodedSession): MapSession {
    return new MapSession(decoded.state, {
      idGenerator: this.options.idGenerator,
      saveMode: this.options.saveMode,
      isNew: false,
    });
  }

  private async guard<T>(operation: string, details: Record<string, unknown>, callback: () => Promise<T>): Promise<T> {
    try {
      return await callback();
    } catch (error) {
      throw toStorageUnavailable(operation, error, details);
    }
  }

  private publish(type: "created" | "deleted" | "expired", sessionId: string, session?: MapSession): void {
    this.options.eventPublisher?.publish({
      type,
      sessionId,
      occurredAt: epochMillis(this.options.clock),
      session,
    });
  }
}

export const createRedisSessionRepository = (options: RedisSessionRepositoryOptions): RedisSessionRepository =>
  new RedisSessionRepository(options);
