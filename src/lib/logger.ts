export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
  error?: Error;
}

export interface LoggerOptions {
  source: string;
  level?: LogLevel;
  /** Where formatted lines go; defaults to the console. */
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function isValidLogLevel(level: string): level is LogLevel {
  return level === "DEBUG" || level === "INFO" || level === "WARN" || level === "ERROR";
}

export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isValidLogLevel(envLevel)) {
    return envLevel;
  }
  return "INFO";
}

export function shouldLog(entryLevel: LogLevel, minLevel?: LogLevel): boolean {
  const min = minLevel || getLogLevel();
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[min];
}

export function formatTimestamp(date?: Date): string {
  const d = date || new Date();
  return d.toISOString();
}

export function formatLogEntry(entry: LogEntry): string {
  let line = `${entry.timestamp} [${entry.level}] [${entry.source}] ${entry.message}`;

  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      const stackLines = entry.error.stack.split("\n").slice(1);
      for (const stackLine of stackLines) {
        line += `\n  ${stackLine.trim()}`;
      }
    }
  }

  return line;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === "ERROR") {
    console.error(line);
  } else if (level === "WARN") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export class Logger {
  private source: string;
  private minLevel: LogLevel;
  private sink: (level: LogLevel, line: string) => void;

  constructor(options: LoggerOptions) {
    this.source = options.source;
    this.minLevel = options.level || getLogLevel();
    this.sink = options.sink ?? consoleSink;
  }

  private log(level: LogLevel, message: string, error?: Error): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: formatTimestamp(),
      level,
      source: this.source,
      message,
      error,
    };

    this.sink(level, formatLogEntry(entry));
  }

  debug(message: string): void {
    this.log("DEBUG", message);
  }

  info(message: string): void {
    this.log("INFO", message);
  }

  warn(message: string, error?: Error): void {
    this.log("WARN", message, error);
  }

  error(message: string, error?: Error): void {
    this.log("ERROR", message, error);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

export function createLogger(source: string, options?: Partial<LoggerOptions>): Logger {
  return new Logger({
    source,
    ...options,
  });
}

export function createCliLogger(options?: Partial<Omit<LoggerOptions, "source">>): Logger {
  return new Logger({
    source: "cli",
    ...options,
  });
}
