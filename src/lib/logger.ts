export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  critical(message: string): void;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `${at.toISOString()} - ${level} - ${message}`;
}

function loggerFromEmit(emit: (level: LogLevel, message: string) => void): Logger {
  return {
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    warning: (message) => emit("WARNING", message),
    error: (message) => emit("ERROR", message),
    critical: (message) => emit("CRITICAL", message),
  };
}

export type ConsoleLoggerParams = {
  level?: LogLevel;
  /** Receives each formatted line. Defaults to stderr so stdout carries only the verdict. */
  write?: (line: string) => void;
  now?: () => Date;
};

export function createConsoleLogger(params: ConsoleLoggerParams = {}): Logger {
  const threshold = SEVERITY[params.level ?? "INFO"];
  const write = params.write ?? ((line: string) => console.error(line));
  const now = params.now ?? (() => new Date());
  return loggerFromEmit((level, message) => {
    if (SEVERITY[level] < threshold) return;
    write(formatLogLine(level, message, now()));
  });
}

export type LogEntry = { level: LogLevel; message: string };

export type MemoryLogger = Logger & { readonly entries: LogEntry[] };

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const logger = loggerFromEmit((level, message) => {
    entries.push({ level, message });
  });
  return { ...logger, entries };
}
