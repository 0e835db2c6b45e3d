export type {
  StrataInstrumentationOptions,
  StrataCounterOptions,
  StrataHistogramOptions,
} from "./metrics.js";
export { getStrataMeter, createStrataCounter, createStrataHistogram } from "./metrics.js";

export type { StrataLogger, StrataLoggerOptions, StrataLogLevel, StrataLogSink } from "./logging.js";
export { consoleLogSink, createStrataLogger, describeError, isStrataLogLevel } from "./logging.js";

export type { StrataTracer, RunWithSpanOptions } from "./tracing.js";
export { getStrataTracer, runWithSpan } from "./tracing.js";
