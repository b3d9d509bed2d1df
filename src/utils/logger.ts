/**
 * Structured console logging
 * Loggers are created explicitly and passed to the components that log
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry, line: string) => void;

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

const consoleSink: LogSink = (entry, line) => {
  if (entry.level === LogLevel.ERROR) {
    console.error(line);
  } else if (entry.level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function parseLogLevel(value: string | undefined, defaultValue: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return defaultValue;
  const upper = value.toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? defaultValue;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? LogLevel.INFO];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      metadata,
    };
    sink(entry, formatLog(entry));
  };

  return {
    debug(message, metadata) {
      write(LogLevel.DEBUG, message, metadata);
    },

    info(message, metadata) {
      write(LogLevel.INFO, message, metadata);
    },

    warn(message, metadata) {
      write(LogLevel.WARN, message, metadata);
    },

    error(message, error, metadata) {
      write(LogLevel.ERROR, message, {
        ...metadata,
        error: serializeError(error),
      });
    },
  };
}
