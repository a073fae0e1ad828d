export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogEntry = {
  at: string;
  level: LogLevel;
  scope: string;
  message: string;
};

export type Logger = {
  scope: string;
  entries: LogEntry[];
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (scope: string) => Logger;
};

export type LoggerOptions = {
  level?: LogLevel;
  /** Keep entries in memory; off by default so long-lived servers do not grow. */
  capture?: boolean;
  /** Suppress console output (entries are still captured when enabled). */
  silent?: boolean;
};

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return buildLogger(scope, options, []);
}

function buildLogger(scope: string, options: LoggerOptions, entries: LogEntry[]): Logger {
  const threshold = rank(options.level ?? "info");

  const push = (level: LogLevel, message: string) => {
    if (rank(level) < threshold) return;

    const entry: LogEntry = {
      at: new Date().toISOString(),
      level,
      scope,
      message,
    };
    if (options.capture) {
      entries.push(entry);
    }
    if (options.silent) return;

    const line = `[ctcae:${scope}:${level}] ${message}`;
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    if (level === "debug") {
      console.debug(line);
      return;
    }
    console.log(line);
  };

  const logger: Logger = {
    scope,
    entries,
    debug: (message) => push("debug", message),
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
    // children share the parent's captured entries
    child: (childScope) => buildLogger(`${scope}:${childScope}`, options, entries),
  };
  return logger;
}
