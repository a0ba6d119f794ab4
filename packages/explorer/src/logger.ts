export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEntry = {
  level: Exclude<LogLevel, "silent">;
  scope?: string;
  message: string;
  details: readonly unknown[];
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export const LOG_ENV = "STAGELENS_LOG";

const DEFAULT_LEVEL: LogLevel = "warn";

const readLogEnv = (): string | undefined => process.env[LOG_ENV];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  if (!raw) return DEFAULT_LEVEL;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LEVEL;
};

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

const formatDetail = (detail: unknown): string => {
  if (detail instanceof Error) return detail.stack ?? detail.message;
  if (typeof detail === "string") return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
};

export const formatLogEntry = (entry: LogEntry): string => {
  const scope = entry.scope ? ` ${entry.scope}:` : "";
  const details = entry.details.map((detail) => ` ${formatDetail(detail)}`).join("");
  return `[${entry.level}]${scope} ${entry.message}${details}`;
};

export const consoleSink: LogSink = (entry) => {
  console.error(formatLogEntry(entry));
};

/** Holds log lines while something else owns the terminal */
export const createBufferedSink = () => {
  const entries: LogEntry[] = [];
  return {
    entries,
    sink: ((entry) => {
      entries.push(entry);
    }) satisfies LogSink,
    flush(write: (line: string) => void) {
      entries.splice(0).forEach((entry) => write(formatLogEntry(entry)));
    },
  };
};

export const createLogger = ({
  level = parseLogLevel(readLogEnv()),
  sink = consoleSink,
  scope,
}: {
  level?: LogLevel;
  sink?: LogSink;
  scope?: string;
} = {}): Logger => {
  const emit =
    (entryLevel: LogEntry["level"]) =>
    (message: string, ...details: unknown[]) => {
      if (rank(entryLevel) < rank(level)) return;
      sink({ level: entryLevel, scope, message, details });
    };

  return {
    level,
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (child) =>
      createLogger({ level, sink, scope: scope ? `${scope}.${child}` : child }),
  };
};

export const silentLogger: Logger = createLogger({ level: "silent" });
