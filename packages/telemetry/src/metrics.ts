import { metrics, type MetricOptions, type Meter, type MeterOptions } from "@opentelemetry/api";

export interface StrataInstrumentationOptions extends MeterOptions {
  readonly name?: string;
  readonly version?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "strata-session";

export const getStrataMeter = (options: StrataInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface StrataCounterOptions extends MetricOptions {
  readonly instrumentation?: StrataInstrumentationOptions;
}

export const createStrataCounter = (name: string, options: StrataCounterOptions = {}) => {
  const { instrumentation, ...counterOptions } = options;
  return getStrataMeter(instrumentation).createCounter(name, counterOptions);
};

export interface StrataHistogramOptions extends MetricOptions {
  readonly instrumentation?: StrataInstrumentationOptions;
}

export const createStrataHistogram = (name: string, options: StrataHistogramOptions = {}) => {
  const { instrumentation, ...histogramOptions } = options;
  return getStrataMeter(instrumentation).createHistogram(name, histogramOptions);
};
