import type { RedisClientType } from "@redis/client";

export interface RedisSetOptions {
  /**
   * Time to live in milliseconds.
   */
  readonly px?: number;
  /**
   * Only write when the key already exists.
   */
  readonly xx?: boolean;
}

/**
 * The Redis commands the session repository issues. Kept narrow so tests can
 * run against an in-process stand-in.
 */
export interface RedisSessionCommands {
  get(key: string): Promise<string | null>;
  /**
   * Resolves `false` when an `xx` write found no key.
   */
  set(key: string, value: string, options?: RedisSetOptions): Promise<boolean>;
  del(keys: ReadonlyArray<string>): Promise<number>;
  pExpire(key: string, milliseconds: number): Promise<boolean>;
  sAdd(key: string, members: ReadonlyArray<string>): Promise<number>;
  sRem(key: string, members: ReadonlyArray<string>): Promise<number>;
  sMembers(key: string): Promise<string[]>;
  zAdd(key: string, score: number, member: string): Promise<number>;
  zRem(key: string, members: ReadonlyArray<string>): Promise<number>;
  zRangeByScore(key: string, min: number, max: number): Promise<string[]>;
  configGet(parameter: string): Promise<string | undefined>;
  configSet(parameter: string, value: string): Promise<void>;
}

export type RedisMessageListener = (message: string, channel: string) => void;

export interface RedisSessionSubscriber {
  pSubscribe(pattern: string, listener: RedisMessageListener): Promise<void>;
  pUnsubscribe(pattern: string): Promise<void>;
}

export const createNodeRedisCommands = (client: RedisClientType): RedisSessionCommands => ({
  get: async (key) => {
    const value = await client.get(key);
    return value === null ? null : String(value);
  },
  set: async (key, value, options = {}) => {
    const reply =
      options.px !== undefined
        ? options.xx
          ? await client.set(key, value, { PX: options.px, XX: true })
          : await client.set(key, value, { PX: options.px })
        : options.xx
          ? await client.set(key, value, { XX: true })
          : await client.set(key, value);
    return reply !== null;
  },
  del: async (keys) => (keys.length === 0 ? 0 : client.del([...keys])),
  pExpire: async (key, milliseconds) => client.pExpire(key, milliseconds),
  sAdd: async (key, members) => (members.length === 0 ? 0 : client.sAdd(key, [...members])),
  sRem: async (key, members) => (members.length === 0 ? 0 : client.sRem(key, [...members])),
  sMembers: async (key) => (await client.sMembers(key)).map(String),
  zAdd: async (key, score, member) => client.zAdd(key, { score, value: member }),
  zRem: async (key, members) => (members.length === 0 ? 0 : client.zRem(key, [...members])),
  zRangeByScore: async (key, min, max) => (await client.zRangeByScore(key, min, max)).map(String),
  configGet: async (parameter) => {
    const reply = await client.configGet(parameter);
    const value = reply[parameter];
    return value === undefined ? undefined : String(value);
  },
  configSet: async (parameter, value) => {
    await client.configSet(parameter, value);
  },
});

/**
 * Wraps a client dedicated to pub/sub; node-redis refuses other commands on it.
 */
export const createNodeRedisSubscriber = (client: RedisClientType): RedisSessionSubscriber => ({
  pSubscribe: async (pattern, listener) => {
    await client.pSubscribe(pattern, (message, channel) => listener(String(message), String(channel)));
  },
  pUnsubscribe: async (pattern) => {
    await client.pUnsubscribe(pattern);
  },
});
