export type {
  RedisSessionCommands,
  RedisSessionSubscriber,
  RedisSetOptions,
  RedisMessageListener,
} from "./commands.js";
export { createNodeRedisCommands, createNodeRedisSubscriber } from "./commands.js";
export { RedisSessionKeys, DEFAULT_REDIS_NAMESPACE, EXPIRY_GRACE_MS } from "./keys.js";
export type { RedisSessionRepositoryOptions } from "./redis-session-repository.js";
export { RedisSessionRepository, createRedisSessionRepository } from "./redis-session-repository.js";
export type { KeyspaceConfigureAction, RedisKeyspaceExpirationListenerOptions } from "./keyspace.js";
export {
  configureKeyspaceNotifications,
  missingKeyspaceFlags,
  RedisKeyspaceExpirationListener,
  EXPIRED_KEYEVENT_PATTERN,
} from "./keyspace.js";
export type { ConnectRedisClientOptions } from "./client.js";
export { connectRedisClient, duplicateForSubscriptions } from "./client.js";
