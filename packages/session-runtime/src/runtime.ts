import type { RedisClientType } from "@redis/client";
import pg, { type Pool } from "pg";

import {
  InvalidArgumentError,
  type ExpiringSessionRepository,
  type IndexResolver,
  type IndexedSessionRepository,
  type SessionIdGenerator,
} from "@strata-session/contracts";
import {
  SessionCleanupScheduler,
  SessionEventBus,
  maxInactiveIntervalMillis,
  type Clock,
  type MapSession,
  type SessionConfig,
  type SessionRepositoryOptions,
} from "@strata-session/core";
import { MemorySessionRepository } from "@strata-session/session-memory";
import {
  PostgresSessionRepository,
  applySessionSchema,
  createPgQueryExecutor,
  type QueryExecutor,
} from "@strata-session/session-postgres";
import {
  RedisKeyspaceExpirationListener,
  RedisSessionRepository,
  configureKeyspaceNotifications,
  connectRedisClient,
  createNodeRedisCommands,
  createNodeRedisSubscriber,
  duplicateForSubscriptions,
  type RedisSessionCommands,
  type RedisSessionSubscriber,
} from "@strata-session/session-redis";
import { createStrataLogger, describeError, type StrataLogger } from "@strata-session/telemetry";

export type SessionRuntimeRepository = IndexedSessionRepository<MapSession> & ExpiringSessionRepository;

export interface SessionRuntimeOverrides {
  readonly pool?: Pool;
  readonly executor?: QueryExecutor;
  /**
   * Create the session tables on `start()` when they do not exist yet.
   */
  readonly initializeSchema?: boolean;
  readonly redisClient?: RedisClientType;
  readonly redisCommands?: RedisSessionCommands;
  readonly redisSubscriber?: RedisSessionSubscriber;
  readonly eventBus?: SessionEventBus;
  readonly logger?: StrataLogger;
  readonly clock?: Clock;
  readonly idGenerator?: SessionIdGenerator;
  readonly indexResolver?: IndexResolver<MapSession>;
}

export interface SessionRuntime {
  readonly config: SessionConfig;
  readonly repository: SessionRuntimeRepository;
  readonly events: SessionEventBus;
  readonly scheduler: SessionCleanupScheduler;
  readonly keyspaceListener?: RedisKeyspaceExpirationListener;
  start(): Promise<void>;
  close(): Promise<void>;
}

interface BackendResources {
  readonly repository: SessionRuntimeRepository;
  readonly keyspaceListener?: RedisKeyspaceExpirationListener;
  readonly onStart: Array<() => Promise<void>>;
  readonly onClose: Array<() => Promise<void>>;
}

/**
 * Builds the repository selected by `config.store` together with the event
 * bus, the cleanup scheduler and, for Redis, the keyspace listener. Clients
 * created here from URLs are closed by `close()`; supplied ones are not.
 */
export const createSessionRuntime = async (
  config: SessionConfig,
  overrides: SessionRuntimeOverrides = {},
): Promise<SessionRuntime> => {
  const logger = overrides.logger ?? createStrataLogger({ name: "strata-session", level: config.logLevel });
  const events = overrides.eventBus ?? new SessionEventBus({ logger: logger.child({ component: "events" }) });
  const backend = await createBackend(config, overrides, events, logger);
  const releaseBackend = async (): Promise<void> => {
    for (const step of backend.onClose) {
      try {
        await step();
      } catch (error) {
        logger.error("session.runtime.close_failed", { store: config.store, error: describeError(error) });
      }
    }
  };

  let scheduler: SessionCleanupScheduler;
  try {
    scheduler = new SessionCleanupScheduler({
      repository: backend.repository,
      cron: config.cleanupCron,
      clock: overrides.clock,
      logger: logger.child({ component: "cleanup" }),
    });
  } catch (error) {
    await releaseBackend();
    throw error;
  }

  let started = false;

  return {
    config,
    repository: backend.repository,
    events,
    scheduler,
    keyspaceListener: backend.keyspaceListener,
    async start() {
      if (started) {
        return;
      }
      for (const step of backend.onStart) {
        await step();
      }
      scheduler.start();
      started = true;
      logger.info("session.runtime.started", { store: config.store, cron: scheduler.expression });
    },
    async close() {
      scheduler.stop();
      await releaseBackend();
      started = false;
      logger.info("session.runtime.closed", { store: config.store });
    },
  } satisfies SessionRuntime;
};

const createBackend = async (
  config: SessionConfig,
  overrides: SessionRuntimeOverrides,
  events: SessionEventBus,
  logger: StrataLogger,
): Promise<BackendResources> => {
  const shared: SessionRepositoryOptions = {
    defaultMaxInactiveInterval: maxInactiveIntervalMillis(config),
    saveMode: config.saveMode,
    eventPublisher: events,
    clock: overrides.clock,
    idGenerator: overrides.idGenerator,
    indexResolver: overrides.indexResolver,
    telemetry: { logger: logger.child({ backend: config.store }) },
  };

  switch (config.store) {
    case "memory":
      return { repository: new MemorySessionRepository(shared), onStart: [], onClose: [] };
    case "postgres":
      return createPostgresBackend(config, overrides, shared);
    case "redis":
      return createRedisBackend(config, overrides, shared, logger);
  }
};

const createPostgresBackend = (
  config: SessionConfig,
  overrides: SessionRuntimeOverrides,
  shared: SessionRepositoryOptions,
): BackendResources => {
  const onClose: Array<() => Promise<void>> = [];
  let pool = overrides.pool;
  if (!pool && !overrides.executor) {
    if (!config.postgres.url) {
      throw new InvalidArgumentError("SESSION_POSTGRES_URL is required for the postgres store.");
    }
    const ownedPool = new pg.Pool({ connectionString: config.postgres.url });
    onClose.push(() => ownedPool.end());
    pool = ownedPool;
  }

  const repository = new PostgresSessionRepository({
    ...shared,
    pool,
    executor: overrides.executor,
    tableName: config.postgres.tableName,
    cleanupBatchSize: config.postgres.cleanupBatchSize,
  });

  const onStart: Array<() => Promise<void>> = [];
  if (overrides.initializeSchema) {
    const executor = overrides.executor ?? (pool ? createPgQueryExecutor(pool) : undefined);
    if (executor) {
      onStart.push(() => applySessionSchema(executor, config.postgres.tableName));
    }
  }

  return { repository, onStart, onClose };
};

const createRedisBackend = async (
  config: SessionConfig,
  overrides: SessionRuntimeOverrides,
  shared: SessionRepositoryOptions,
  logger: StrataLogger,
): Promise<BackendResources> => {
  const onStart: Array<() => Promise<void>> = [];
  const onClose: Array<() => Promise<void>> = [];

  let client = overrides.redisClient;
  if (!client && !overrides.redisCommands) {
    if (!config.redis.url) {
      throw new InvalidArgumentError("SESSION_REDIS_URL is required for the redis store.");
    }
    const ownedClient = await connectRedisClient({ url: config.redis.url, logger });
    onClose.push(async () => {
      await ownedClient.quit();
    });
    client = ownedClient;
  }

  const commands = overrides.redisCommands ?? (client ? createNodeRedisCommands(client) : undefined);
  if (!commands) {
    throw new InvalidArgumentError("The redis store requires a client or command adapter.");
  }

  const repository = new RedisSessionRepository({
    ...shared,
    commands,
    namespace: config.redis.namespace,
  });

  onStart.push(() =>
    configureKeyspaceNotifications(commands, config.redis.configureAction, logger.child({ component: "keyspace" })),
  );

  let subscriber = overrides.redisSubscriber;
  if (!subscriber && client) {
    const subscriberClient = await duplicateForSubscriptions(client);
    onClose.push(async () => {
      await subscriberClient.quit();
    });
    subscriber = createNodeRedisSubscriber(subscriberClient);
  }

  if (!subscriber) {
    logger.warn("session.runtime.keyspace_disabled", {
      reason: "no subscriber connection; expiry relies on lookups and the sweep",
    });
    return { repository, onStart, onClose };
  }

  const keyspaceListener = new RedisKeyspaceExpirationListener({
    subscriber,
    repository,
    logger: logger.child({ component: "keyspace" }),
  });
  onStart.push(() => keyspaceListener.start());
  onClose.unshift(() => keyspaceListener.stop());

  return { repository, keyspaceListener, onStart, onClose };
};
