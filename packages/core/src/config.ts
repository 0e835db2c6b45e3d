import { InvalidArgumentError, type SaveMode } from "@strata-session/contracts";
import type { StrataLogLevel } from "@strata-session/telemetry";
import { z } from "zod";

import { DEFAULT_CLEANUP_CRON } from "./expiration/cleanup-scheduler.js";

export type SessionStoreType = "memory" | "postgres" | "redis";

export type RedisConfigureAction = "notify" | "none";

export interface SessionConfig {
  readonly store: SessionStoreType;
  readonly maxInactiveIntervalSeconds: number;
  readonly saveMode: SaveMode;
  readonly cleanupCron: string;
  readonly logLevel: StrataLogLevel;
  readonly postgres: {
    readonly url?: string;
    readonly tableName: string;
    readonly cleanupBatchSize: number;
  };
  readonly redis: {
    readonly url?: string;
    readonly namespace: string;
    readonly configureAction: RedisConfigureAction;
  };
}

const emptyAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

const saveModeSchema = z.enum(["on_set_attribute", "on_get_attribute", "always"]) satisfies z.ZodType<SaveMode>;

const sessionEnvSchema = z.object({
  SESSION_STORE: z.preprocess(emptyAsUndefined, z.enum(["memory", "postgres", "redis"]).default("memory")),
  SESSION_MAX_INACTIVE_INTERVAL_SECONDS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().default(1800),
  ),
  SESSION_SAVE_MODE: z.preprocess(emptyAsUndefined, saveModeSchema.default("on_set_attribute")),
  SESSION_CLEANUP_CRON: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_CLEANUP_CRON)),
  SESSION_LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(["debug", "info", "warn", "error"]).default("info")),
  SESSION_POSTGRES_URL: optionalString,
  SESSION_POSTGRES_TABLE: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Table name may only contain letters, digits and underscores")
      .default("strata_sessions"),
  ),
  SESSION_POSTGRES_CLEANUP_BATCH_SIZE: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(1000),
  ),
  SESSION_REDIS_URL: optionalString,
  SESSION_REDIS_NAMESPACE: z.preprocess(
    emptyAsUndefined,
    z.string().regex(/^\S+$/, "Namespace must not contain whitespace").default("session"),
  ),
  SESSION_REDIS_CONFIGURE_ACTION: z.preprocess(emptyAsUndefined, z.enum(["notify", "none"]).default("notify")),
});

/**
 * Reads session settings from environment variables. Unknown variables are
 * ignored; invalid ones raise `InvalidArgumentError` listing every issue.
 */
export const loadSessionConfig = (env: NodeJS.ProcessEnv = process.env): SessionConfig => {
  const parsed = sessionEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidArgumentError(`Invalid session configuration: ${issues.join("; ")}`, { issues });
  }

  const values = parsed.data;
  return {
    store: values.SESSION_STORE,
    maxInactiveIntervalSeconds: values.SESSION_MAX_INACTIVE_INTERVAL_SECONDS,
    saveMode: values.SESSION_SAVE_MODE,
    cleanupCron: values.SESSION_CLEANUP_CRON,
    logLevel: values.SESSION_LOG_LEVEL,
    postgres: {
      url: values.SESSION_POSTGRES_URL,
      tableName: values.SESSION_POSTGRES_TABLE,
      cleanupBatchSize: values.SESSION_POSTGRES_CLEANUP_BATCH_SIZE,
    },
    redis: {
      url: values.SESSION_REDIS_URL,
      namespace: values.SESSION_REDIS_NAMESPACE,
      configureAction: values.SESSION_REDIS_CONFIGURE_ACTION,
    },
  };
};

export const maxInactiveIntervalMillis = (config: Pick<SessionConfig, "maxInactiveIntervalSeconds">): number =>
  config.maxInactiveIntervalSeconds * 1000;
