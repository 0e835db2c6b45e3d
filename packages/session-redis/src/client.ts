import { createClient, type RedisClientOptions, type RedisClientType } from "@redis/client";

import { describeError, type StrataLogger } from "@strata-session/telemetry";

export interface ConnectRedisClientOptions {
  readonly url?: string;
  readonly socket?: RedisClientOptions["socket"];
  readonly username?: string;
  readonly password?: string;
  readonly logger?: StrataLogger;
}

export const connectRedisClient = async (options: ConnectRedisClientOptions = {}): Promise<RedisClientType> => {
  const client: RedisClientType = createClient({
    url: options.url,
    socket: options.socket,
    username: options.username,
    password: options.password,
  });

  client.on("error", (error: unknown) => {
    options.logger?.error("session.redis.client_error", { error: describeError(error) });
  });

  if (!client.isOpen) {
    await client.connect();
  }
  return client;
};

/**
 * A second connection for pub/sub; a subscribed connection accepts no other commands.
 */
export const duplicateForSubscriptions = async (client: RedisClientType): Promise<RedisClientType> => {
  const subscriber: RedisClientType = client.duplicate();
  await subscriber.connect();
  return subscriber;
};
