export type StrataLogLevel = "debug" | "info" | "warn" | "error";

/**
 * Receives each rendered JSON line together with its level.
 */
export type StrataLogSink = (level: StrataLogLevel, line: string) => void;

export interface StrataLoggerOptions {
  /**
   * Written as the `service` field. Defaults to `strata-session`.
   */
  readonly name?: string;
  readonly level?: StrataLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly sink?: StrataLogSink;
  readonly now?: () => Date;
}

export interface StrataLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): StrataLogger;
}

const LEVEL_RANK: Readonly<Record<StrataLogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isStrataLogLevel = (value: string): value is StrataLogLevel => Object.hasOwn(LEVEL_RANK, value);

export const consoleLogSink: StrataLogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    default:
      console.log(line);
  }
};

interface LoggerSettings {
  readonly threshold: number;
  readonly sink: StrataLogSink;
  readonly now: () => Date;
}

/**
 * One JSON object per line: timestamp, level and message first, then the
 * logger's bound fields, then the call's context. Later keys win.
 */
class JsonLogger implements StrataLogger {
  constructor(
    private readonly settings: LoggerSettings,
    private readonly fields: Readonly<Record<string, unknown>>,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  child(context: Record<string, unknown>): StrataLogger {
    return new JsonLogger(this.settings, { ...this.fields, ...context });
  }

  private write(level: StrataLogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.settings.threshold) {
      return;
    }
    const entry = {
      timestamp: this.settings.now().toISOString(),
      level,
      message,
      ...this.fields,
      ...context,
    };
    this.settings.sink(level, JSON.stringify(entry));
  }
}

export const createStrataLogger = (options: StrataLoggerOptions = {}): StrataLogger =>
  new JsonLogger(
    {
      threshold: LEVEL_RANK[options.level ?? "info"],
      sink: options.sink ?? consoleLogSink,
      now: options.now ?? (() => new Date()),
    },
    { service: options.name ?? "strata-session", ...options.fields },
  );

/**
 * Renders an unknown thrown value as a log-friendly string.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
