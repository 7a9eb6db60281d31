// Logger interface for structured logging

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Create a child logger with additional context fields. */
  child(context: Record<string, unknown>): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = (line: string) => void;

export interface ConsoleLoggerOptions {
  readonly context?: Record<string, unknown>;
  /** Override where lines go (tests capture output this way). */
  readonly sink?: Partial<Record<Exclude<LogLevel, "silent">, Sink>>;
}

/**
 * Console logger that writes one JSON object per line.
 * Errors go to stderr, warnings to console.warn, the rest to stdout.
 */
export class ConsoleLogger implements Logger {
  private readonly context: Record<string, unknown>;
  private readonly minLevel: number;

  constructor(
    private readonly level: LogLevel = "info",
    private readonly options: ConsoleLoggerOptions = {},
  ) {
    this.context = options.context ?? {};
    this.minLevel = LEVEL_ORDER[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, {
      ...this.options,
      context: { ...this.context, ...context },
    });
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.minLevel) return;

    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...data,
    };

    const output = JSON.stringify(entry);
    const sink = this.options.sink?.[level];

    if (sink) {
      sink(output);
    } else if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }
  }
}

/** Logger that drops everything. Default for components constructed without one. */
export const silentLogger: Logger = new ConsoleLogger("silent");

/** Render an unknown thrown value for a log field. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
