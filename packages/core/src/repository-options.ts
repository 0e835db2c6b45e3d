import {
  InvalidArgumentError,
  type IndexResolver,
  type SaveMode,
  type SessionEventPublisher,
  type SessionIdGenerator,
} from "@strata-session/contracts";

import { systemClock, type Clock } from "./clock.js";
import { PrincipalNameIndexResolver } from "./indexing/index-resolvers.js";
import { UuidSessionIdGenerator } from "./session/id-generators.js";
import { DEFAULT_MAX_INACTIVE_INTERVAL_MS, type MapSession } from "./session/map-session.js";
import type { RepositoryTelemetryOptions } from "./telemetry.js";

/**
 * Settings every repository accepts, whatever its backend.
 */
export interface SessionRepositoryOptions<S extends MapSession = MapSession> {
  /**
   * Milliseconds. Zero or negative creates sessions that never expire.
   */
  readonly defaultMaxInactiveInterval?: number;
  /**
   * Omit for random UUIDs. `null` is rejected rather than defaulted.
   */
  readonly idGenerator?: SessionIdGenerator | null;
  readonly saveMode?: SaveMode;
  readonly indexResolver?: IndexResolver<S>;
  readonly eventPublisher?: SessionEventPublisher;
  readonly clock?: Clock;
  readonly telemetry?: RepositoryTelemetryOptions;
}

export interface ResolvedSessionRepositoryOptions<S extends MapSession = MapSession> {
  readonly defaultMaxInactiveInterval: number;
  readonly idGenerator: SessionIdGenerator;
  readonly saveMode: SaveMode;
  readonly indexResolver: IndexResolver<S>;
  readonly eventPublisher?: SessionEventPublisher;
  readonly clock: Clock;
}

export const resolveSessionRepositoryOptions = <S extends MapSession>(
  options: SessionRepositoryOptions<S>,
): ResolvedSessionRepositoryOptions<S> => {
  const defaultMaxInactiveInterval = options.defaultMaxInactiveInterval ?? DEFAULT_MAX_INACTIVE_INTERVAL_MS;
  if (!Number.isFinite(defaultMaxInactiveInterval)) {
    throw new InvalidArgumentError("defaultMaxInactiveInterval must be a finite number of milliseconds.", {
      defaultMaxInactiveInterval,
    });
  }

  if (options.idGenerator === null) {
    throw new InvalidArgumentError("idGenerator must not be null.");
  }
  const idGenerator = options.idGenerator ?? new UuidSessionIdGenerator();
  if (typeof idGenerator.generate !== "function") {
    throw new InvalidArgumentError("idGenerator must provide a generate() function.");
  }

  return {
    defaultMaxInactiveInterval,
    idGenerator,
    saveMode: options.saveMode ?? "on_set_attribute",
    indexResolver: options.indexResolver ?? new PrincipalNameIndexResolver<S>(),
    eventPublisher: options.eventPublisher,
    clock: options.clock ?? systemClock,
  };
};
