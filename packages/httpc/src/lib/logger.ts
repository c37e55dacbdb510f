// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/** One JSON log line */
export interface LogEntry extends LogMeta {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/** Destination for formatted lines */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  /** Least severe level that is written */
  level: LogLevel;
  /** One JSON object per line instead of `[time] LEVEL message {meta}` */
  json: boolean;
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `defaultMeta` to every line; call metadata wins on conflict */
  child(defaultMeta: LogMeta): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SEVERITY: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const STREAM: Record<LogLevel, keyof LogSink> = {
  debug: "out",
  info: "out",
  warn: "err",
  error: "err",
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

function formatLine(json: boolean, level: LogLevel, message: string, meta: LogMeta): string {
  const timestamp = new Date().toISOString();

  if (json) {
    const entry: LogEntry = { timestamp, level, message, ...meta };
    return JSON.stringify(entry);
  }

  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

/**
 * Levelled logger writing to stdout (debug, info) and stderr (warn, error),
 * or to `options.sink`.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY.indexOf(options.level);
  const sink = options.sink ?? consoleSink;

  function bind(defaults: LogMeta): Logger {
    const emit = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
      if (SEVERITY.indexOf(level) < threshold) return;
      sink[STREAM[level]](formatLine(options.json, level, message, { ...defaults, ...meta }));
    };

    return {
      debug: emit("debug"),
      info: emit("info"),
      warn: emit("warn"),
      error: emit("error"),
      child: (meta) => bind({ ...defaults, ...meta }),
    };
  }

  return bind({});
}

/** Logger for library callers that did not pass one. */
export function createNoopLogger(): Logger {
  const ignore = () => {};
  const logger: Logger = {
    debug: ignore,
    info: ignore,
    warn: ignore,
    error: ignore,
    child: () => logger,
  };
  return logger;
}
