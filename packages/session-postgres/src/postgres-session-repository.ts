import {
  InvalidArgumentError,
  PRINCIPAL_NAME_INDEX_NAME,
  toStorageUnavailable,
  type ExpiringSessionRepository,
  type IndexedSessionRepository,
  type SessionSweepSummary,
} from "@strata-session/contracts";
import {
  AttributeCodec,
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

import { createPgQueryExecutor, type PgQueryable } from "./executors/pg-query-executor.js";
import type { QueryExecutor, QueryRow } from "./executors/query-executor.js";
import { DEFAULT_SESSION_TABLE_NAME, assertTableName } from "./migrations/index.js";
import { PostgresSession } from "./postgres-session.js";
import {
  PostgresTransactionManager,
  type PostgresConnectionSource,
} from "./transactions/transaction-manager.js";

export const DEFAULT_CLEANUP_BATCH_SIZE = 1000;

export interface PostgresSessionRepositoryOptions extends SessionRepositoryOptions<PostgresSession> {
  /**
   * Used for reads and for transactions. Either this or `executor` is required.
   */
  readonly pool?: PgQueryable & PostgresConnectionSource;
  readonly executor?: QueryExecutor;
  readonly tableName?: string;
  readonly attributeCodec?: AttributeCodec;
  /**
   * Upper bound on rows removed by one cleanup run.
   */
  readonly cleanupBatchSize?: number;
}

type SessionRow = {
  readonly primary_id: string;
  readonly session_id: string;
  readonly creation_time: string | number;
  readonly last_access_time: string | number;
  readonly max_inactive_interval: string | number;
  readonly principal_name: string | null;
  readonly attribute_name: string | null;
  readonly attribute_value: string | null;
};

type ExpiredCandidateRow = {
  readonly primary_id: string;
  readonly session_id: string;
};

type PrimaryKeyRow = {
  readonly primary_id: string;
};

type Queries = ReturnType<typeof buildQueries>;

type StatementName = Exclude<keyof Queries, "selectExpired">;

const BACKEND = "postgres";

const toMillis = (value: string | number): number => Number(value);

const expiryTimeOf = (session: PostgresSession): number | null =>
  session.maxInactiveInterval > 0 ? session.lastAccessedTime + session.maxInactiveInterval : null;

const buildQueries = (table: string) => {
  const attributes = `${table}_attributes`;
  const selectColumns = `s.primary_id, s.session_id, s.creation_time, s.last_access_time,
      s.max_inactive_interval, s.principal_name, a.attribute_name, a.attribute_value`;

  return {
    insertSession: `INSERT INTO ${table} (
        primary_id, session_id, creation_time, last_access_time,
        max_inactive_interval, expiry_time, principal_name
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
    updateSession: `UPDATE ${table}
      SET session_id = $2, last_access_time = $3, max_inactive_interval = $4,
        expiry_time = $5, principal_name = $6
      WHERE primary_id = $1
      RETURNING primary_id`,
    upsertAttribute: `INSERT INTO ${attributes} (session_primary_id, attribute_name, attribute_value)
      VALUES ($1, $2, $3)
      ON CONFLICT (session_primary_id, attribute_name)
      DO UPDATE SET attribute_value = EXCLUDED.attribute_value`,
    deleteAttribute: `DELETE FROM ${attributes} WHERE session_primary_id = $1 AND attribute_name = $2`,
    selectById: `SELECT ${selectColumns}
      FROM ${table} s
      LEFT JOIN ${attributes} a ON a.session_primary_id = s.primary_id
      WHERE s.session_id = $1`,
    selectByPrincipalName: `SELECT ${selectColumns}
      FROM ${table} s
      LEFT JOIN ${attributes} a ON a.session_primary_id = s.primary_id
      WHERE s.principal_name = $1`,
    deleteByPrimaryKey: `DELETE FROM ${table} WHERE primary_id = $1 RETURNING primary_id`,
    // A NULL expiry_time never compares true, so sessions that never expire are skipped.
    deleteIfExpired: `DELETE FROM ${table}
      WHERE primary_id = $1 AND expiry_time <= $2
      RETURNING primary_id`,
    selectExpired: (limit: number) => `SELECT primary_id, session_id FROM ${table}
      WHERE expiry_time <= $1
      ORDER BY expiry_time
      LIMIT ${limit}`,
  };
};

/**
 * Stores each session as one row plus one row per attribute, so saves write
 * only what changed. Only the principal-name index is queryable here.
 */
export class PostgresSessionRepository
  implements IndexedSessionRepository<PostgresSession>, ExpiringSessionRepository
{
  private readonly executor: QueryExecutor;
  private readonly transactions: PostgresTransactionManager;
  private readonly options: ResolvedSessionRepositoryOptions<PostgresSession>;
  private readonly codec: AttributeCodec;
  private readonly telemetry: RepositoryTelemetryContext;
  private readonly queries: Queries;
  private readonly cleanupBatchSize: number;

  constructor(options: PostgresSessionRepositoryOptions) {
    this.options = resolveSessionRepositoryOptions(options);
    this.telemetry = createRepositoryTelemetry(BACKEND, options.telemetry);

    const executor = options.executor ?? (options.pool ? createPgQueryExecutor(options.pool) : undefined);
    if (!executor) {
      throw new InvalidArgumentError("PostgresSessionRepository requires a pool or query executor.");
    }
    this.executor = executor;
    this.transactions = new PostgresTransactionManager({
      pool: options.pool,
      executor,
      logger: this.telemetry.logger,
    });

    const cleanupBatchSize = options.cleanupBatchSize ?? DEFAULT_CLEANUP_BATCH_SIZE;
    if (!Number.isInteger(cleanupBatchSize) || cleanupBatchSize <= 0) {
      throw new InvalidArgumentError("cleanupBatchSize must be a positive integer.", { cleanupBatchSize });
    }
    this.cleanupBatchSize = cleanupBatchSize;
    this.codec = options.attributeCodec ?? new AttributeCodec();
    this.queries = buildQueries(assertTableName(options.tableName ?? DEFAULT_SESSION_TABLE_NAME));
  }

  get defaultMaxInactiveInterval(): number {
    return this.options.defaultMaxInactiveInterval;
  }

  createSession(): PostgresSession {
    return new PostgresSession(
      initialSessionState(this.options.idGenerator, epochMillis(this.options.clock), this.defaultMaxInactiveInterval),
      { idGenerator: this.options.idGenerator, saveMode: this.options.saveMode },
    );
  }

  async save(session: PostgresSession): Promise<void> {
    await instrumentOperation(this.telemetry, BACKEND, "save", { "session.id": session.id }, async () => {
      if (!session.hasChanges()) {
        return;
      }

      const changes = session.getPendingChanges();
      const principalName = this.options.indexResolver.resolveIndexesFor(session)[PRINCIPAL_NAME_INDEX_NAME];
      const writes: Array<{ readonly name: string; readonly payload: string | undefined }> = [];
      for (const [name, value] of changes.attributes) {
        writes.push({ name, payload: value === undefined ? undefined : this.codec.encode(name, value) });
      }

      const created = session.isNew;
      const persisted = await this.guard("save", { sessionId: session.id }, () =>
        this.transactions.runInTransaction(async (executor) => {
          if (created) {
            await this.run(executor, "insertSession", [
              session.primaryKey,
              session.id,
              session.creationTime,
              session.lastAccessedTime,
              session.maxInactiveInterval,
              expiryTimeOf(session),
              principalName ?? null,
            ]);
          } else {
            const rows = await this.run<PrimaryKeyRow>(executor, "updateSession", [
              session.primaryKey,
              session.id,
              session.lastAccessedTime,
              session.maxInactiveInterval,
              expiryTimeOf(session),
              principalName ?? null,
            ]);
            if (rows.length === 0) {
              return false;
            }
          }

          for (const write of writes) {
            if (write.payload === undefined) {
              if (!created) {
                await this.run(executor, "deleteAttribute", [session.primaryKey, write.name]);
              }
            } else {
              await this.run(executor, "upsertAttribute", [session.primaryKey, write.name, write.payload]);
            }
          }
          return true;
        }),
      );

      if (!persisted) {
        this.telemetry.logger.warn("session.save.skipped", {
          sessionId: session.originalId,
          reason: "session was deleted concurrently",
        });
        return;
      }

      session.markPersisted();
      session.recordPrincipalName(principalName);
      if (created) {
        this.publish("created", session.id, session);
      }
    });
  }

  async findById(id: string): Promise<PostgresSession | undefined> {
    return instrumentOperation(this.telemetry, BACKEND, "findById", { "session.id": id }, async () => {
      const rows = await this.guard("findById", { sessionId: id }, () =>
        this.run<SessionRow>(this.executor, "selectById", [id]),
      );
      const [session] = this.toSessions(rows);
      if (!session) {
        return undefined;
      }
      const now = epochMillis(this.options.clock);
      if (session.isExpired(now)) {
        await this.expire(session, now);
        return undefined;
      }
      return session;
    });
  }

  async deleteById(id: string): Promise<void> {
    await instrumentOperation(this.telemetry, BACKEND, "deleteById", { "session.id": id }, async () => {
      const rows = await this.guard("deleteById", { sessionId: id }, () =>
        this.run<SessionRow>(this.executor, "selectById", [id]),
      );
      const [session] = this.toSessions(rows);
      if (!session) {
        return;
      }
      const removed = await this.guard("deleteById", { sessionId: id }, async () => {
        const deleted = await this.run<PrimaryKeyRow>(this.executor, "deleteByPrimaryKey", [session.primaryKey]);
        return deleted.length > 0;
      });
      if (removed) {
        this.publish("deleted", session.id, session);
      }
    });
  }

  async findByIndexNameAndIndexValue(
    indexName: string,
    indexValue: string,
  ): Promise<ReadonlyMap<string, PostgresSession>> {
    return instrumentOperation(
      this.telemetry,
      BACKEND,
      "findByIndexNameAndIndexValue",
      { "session.index_name": indexName },
      async () => {
        const sessions = new Map<string, PostgresSession>();
        if (indexName !== PRINCIPAL_NAME_INDEX_NAME) {
          return sessions;
        }

        const rows = await this.guard("findByIndexNameAndIndexValue", { indexName }, () =>
          this.run<SessionRow>(this.executor, "selectByPrincipalName", [indexValue]),
        );
        const now = epochMillis(this.options.clock);
        for (const session of this.toSessions(rows)) {
          if (session.isExpired(now)) {
            await this.expire(session, now);
            continue;
          }
          sessions.set(session.id, session);
        }
        return sessions;
      },
    );
  }

  async cleanUpExpiredSessions(now: number = epochMillis(this.options.clock)): Promise<SessionSweepSummary> {
    return instrumentOperation(this.telemetry, BACKEND, "cleanUpExpiredSessions", {}, async () => {
      const candidates = await this.guard("cleanUpExpiredSessions", {}, async () => {
        const result = await this.executor.query<ExpiredCandidateRow>(
          this.queries.selectExpired(this.cleanupBatchSize),
          [now],
        );
        this.telemetry.logger.debug("postgres.statement", { statement: "selectExpired", rows: result.rows.length });
        return result.rows;
      });

      let expired = 0;
      let failed = 0;
      for (const candidate of candidates) {
        try {
          const rows = await this.run<PrimaryKeyRow>(this.executor, "deleteIfExpired", [candidate.primary_id, now]);
          if (rows.length > 0) {
            expired += 1;
            this.telemetry.metrics.expiredCounter.add(1, { backend: BACKEND });
            this.publish("expired", candidate.session_id);
          }
        } catch (error) {
          failed += 1;
          this.telemetry.logger.error("session.sweep.entry_failed", {
            sessionId: candidate.session_id,
            error: describeError(error),
          });
        }
      }

      this.telemetry.metrics.sweepCounter.add(1, { backend: BACKEND });
      return { scanned: candidates.length, expired, failed } satisfies SessionSweepSummary;
    });
  }

  /**
   * Deletes the row only if it is still expired at `now`, so a concurrent
   * save that extended the session wins.
   */
  private async expire(session: PostgresSession, now: number): Promise<void> {
    const removed = await this.guard("expire", { sessionId: session.id }, async () => {
      const deleted = await this.run<PrimaryKeyRow>(this.executor, "deleteIfExpired", [session.primaryKey, now]);
      return deleted.length > 0;
    });
    if (removed) {
      this.telemetry.metrics.expiredCounter.add(1, { backend: BACKEND });
      this.publish("expired", session.id, session);
    }
  }

  private async run<Row extends QueryRow = QueryRow>(
    executor: QueryExecutor,
    statement: StatementName,
    params: ReadonlyArray<unknown>,
  ): Promise<ReadonlyArray<Row>> {
    const { rows } = await executor.query<Row>(this.queries[statement], params);
    this.telemetry.logger.debug("postgres.statement", { statement, rows: rows.length });
    return rows;
  }

  private toSessions(rows: ReadonlyArray<SessionRow>): PostgresSession[] {
    const grouped = new Map<string, { readonly head: SessionRow; readonly attributes: Map<string, unknown> }>();
    for (const row of rows) {
      let entry = grouped.get(row.primary_id);
      if (!entry) {
        entry = { head: row, attributes: new Map() };
        grouped.set(row.primary_id, entry);
      }
      if (row.attribute_name !== null && row.attribute_value !== null) {
        entry.attributes.set(row.attribute_name, this.codec.decode(row.attribute_name, row.attribute_value));
      }
    }

    return [...grouped.values()].map(
      ({ head, attributes }) =>
        new PostgresSession(
          {
            id: head.session_id,
            creationTime: toMillis(head.creation_time),
            lastAccessedTime: toMillis(head.last_access_time),
            maxInactiveInterval: toMillis(head.max_inactive_interval),
            attributes,
          },
          {
            idGenerator: this.options.idGenerator,
            saveMode: this.options.saveMode,
            isNew: false,
            primaryKey: head.primary_id,
            principalName: head.principal_name ?? undefined,
          },
        ),
    );
  }

  private async guard<T>(
    operation: string,
    details: Record<string, unknown>,
    callback: () => Promise<T>,
  ): Promise<T> {
    try {
      return await callback();
    } catch (error) {
      throw toStorageUnavailable(operation, error, details);
    }
  }

  private publish(type: "created" | "deleted" | "expired", sessionId: string, session?: PostgresSession): void {
    this.options.eventPublisher?.publish({
      type,
      sessionId,
      occurredAt: epochMillis(this.options.clock),
      session,
    });
  }
}

export const createPostgresSessionRepository = (
  options: PostgresSessionRepositoryOptions,
): PostgresSessionRepository => new PostgresSessionRepository(options);
