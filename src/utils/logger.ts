/**
 * Console logging utility
 * One line per entry, metadata appended as JSON
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  metadata?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || '').toUpperCase();
  return Object.values(LogLevel).find(level => level === raw) ?? LogLevel.INFO;
}

export function formatLog(entry: LogEntry): string {
  const scopeStr = entry.scope ? `[${entry.scope}] ` : '';
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${scopeStr}${entry.message}${metadataStr}`;
}

export function serializeError(error: unknown): unknown {
  return error instanceof Error ? {
    name: error.name,
    message: error.message,
    stack: error.stack,
  } : error;
}

function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[thresholdFromEnv()]) return;

    const line = formatLog({
      level,
      message,
      timestamp: new Date().toISOString(),
      scope,
      metadata,
    });

    if (level === LogLevel.ERROR) console.error(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, metadata) => write(LogLevel.DEBUG, message, metadata),
    info: (message, metadata) => write(LogLevel.INFO, message, metadata),
    warn: (message, metadata) => write(LogLevel.WARN, message, metadata),
    error: (message, error, metadata) =>
      write(LogLevel.ERROR, message, { ...metadata, error: serializeError(error) }),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger = createLogger();
