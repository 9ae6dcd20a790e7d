export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minimumLevel: LogLevel = 'info';

function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Set the lowest level that is written. Defaults to info.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

/**
 * Shorten a session token for log output. Tokens grant access and are never
 * written in full.
 */
export function redactToken(token: string): string {
  return `${token.slice(0, 4)}...`;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) console.debug(formatLog(createLogEntry('debug', message, data)));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) console.info(formatLog(createLogEntry('info', message, data)));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) console.warn(formatLog(createLogEntry('warn', message, data)));
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) console.error(formatLog(createLogEntry('error', message, data)));
  },
};
