import {
  createStrataCounter,
  createStrataHistogram,
  createStrataLogger,
  describeError,
  getStrataTracer,
  runWithSpan,
  type StrataInstrumentationOptions,
  type StrataLogger,
  type StrataTracer,
} from "@strata-session/telemetry";

export interface RepositoryTelemetryMetrics {
  readonly operationCounter: ReturnType<typeof createStrataCounter>;
  readonly operationDuration: ReturnType<typeof createStrataHistogram>;
  readonly expiredCounter: ReturnType<typeof createStrataCounter>;
  readonly sweepCounter: ReturnType<typeof createStrataCounter>;
}

export interface RepositoryTelemetryOptions {
  readonly instrumentation?: StrataInstrumentationOptions;
  readonly tracer?: StrataTracer;
  readonly logger?: StrataLogger;
  readonly metrics?: Partial<RepositoryTelemetryMetrics>;
}

export interface RepositoryTelemetryContext {
  readonly tracer: StrataTracer;
  readonly logger: StrataLogger;
  readonly metrics: RepositoryTelemetryMetrics;
  readonly instrumentation: StrataInstrumentationOptions;
}

export const createRepositoryTelemetry = (
  backend: string,
  options: RepositoryTelemetryOptions = {},
): RepositoryTelemetryContext => {
  const instrumentation: StrataInstrumentationOptions = {
    name: `session-${backend}`,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getStrataTracer(instrumentation);
  const logger =
    options.logger ?? createStrataLogger({ name: instrumentation.name ?? `session-${backend}` });
  const metrics: RepositoryTelemetryMetrics = {
    operationCounter:
      options.metrics?.operationCounter ??
      createStrataCounter("session_operations_total", {
        description: "Count of session repository operations.",
        instrumentation,
      }),
    operationDuration:
      options.metrics?.operationDuration ??
      createStrataHistogram("session_operation_duration_ms", {
        description: "Duration of session repository operations.",
        unit: "ms",
        instrumentation,
      }),
    expiredCounter:
      options.metrics?.expiredCounter ??
      createStrataCounter("session_expired_total", {
        description: "Count of sessions removed because they expired.",
        instrumentation,
      }),
    sweepCounter:
      options.metrics?.sweepCounter ??
      createStrataCounter("session_sweep_runs_total", {
        description: "Count of expiration sweeps.",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies RepositoryTelemetryContext;
};

/**
 * Runs one repository operation inside a span, recording count and duration
 * with the outcome.
 */
export const instrumentOperation = async <T>(
  telemetry: RepositoryTelemetryContext,
  backend: string,
  operation: string,
  attributes: Record<string, string | number | undefined>,
  callback: () => Promise<T>,
): Promise<T> => {
  const start = performance.now();
  let outcome: "ok" | "error" = "ok";

  try {
    return await runWithSpan(
      telemetry.tracer,
      `session.${operation}`,
      async () => callback(),
      {
        attributes: { "session.backend": backend, "session.operation": operation, ...attributes },
        onError: (error) => {
          outcome = "error";
          telemetry.logger.error(`session.${operation}.failed`, { ...attributes, error: describeError(error) });
        },
      },
    );
  } finally {
    const duration = performance.now() - start;
    telemetry.metrics.operationCounter.add(1, { backend, operation, outcome });
    telemetry.metrics.operationDuration.record(duration, { backend, operation, outcome });
  }
};
