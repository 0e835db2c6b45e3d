export type { Clock } from "./clock.js";
export { systemClock, epochMillis } from "./clock.js";

export type { SessionState, MapSessionOptions, SessionChanges } from "./session/map-session.js";
export { MapSession, DEFAULT_MAX_INACTIVE_INTERVAL_MS, initialSessionState } from "./session/map-session.js";
export type { SequentialSessionIdGeneratorOptions } from "./session/id-generators.js";
export {
  UuidSessionIdGenerator,
  SequentialSessionIdGenerator,
  createSessionIdGenerator,
} from "./session/id-generators.js";

export type { JsonValue } from "./codec/attribute-codec.js";
export { AttributeCodec } from "./codec/attribute-codec.js";
export type { DecodedSession } from "./codec/session-codec.js";
export { SessionCodec } from "./codec/session-codec.js";

export type { PrincipalNameIndexResolverOptions } from "./indexing/index-resolvers.js";
export {
  PrincipalNameIndexResolver,
  DelegatingIndexResolver,
  DEFAULT_PRINCIPAL_ATTRIBUTE,
  findByPrincipalName,
} from "./indexing/index-resolvers.js";

export type { SessionEventBusOptions, SessionEventSubscription } from "./events/session-event-bus.js";
export { SessionEventBus } from "./events/session-event-bus.js";

export type { SessionCleanupSchedulerOptions } from "./expiration/cleanup-scheduler.js";
export { longestCronGapSeconds } from "./expiration/cron-period.js";
export {
  SessionCleanupScheduler,
  DEFAULT_CLEANUP_CRON,
  intervalToCronExpression,
} from "./expiration/cleanup-scheduler.js";

export type {
  RepositoryTelemetryContext,
  RepositoryTelemetryMetrics,
  RepositoryTelemetryOptions,
} from "./telemetry.js";
export { createRepositoryTelemetry, instrumentOperation } from "./telemetry.js";

export type {
  SessionRepositoryOptions,
  ResolvedSessionRepositoryOptions,
} from "./repository-options.js";
export { resolveSessionRepositoryOptions } from "./repository-options.js";

export type { SessionConfig, SessionStoreType, RedisConfigureAction } from "./config.js";
export { loadSessionConfig, maxInactiveIntervalMillis } from "./config.js";
