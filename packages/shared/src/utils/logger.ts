export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level that is written. `silent` suppresses everything.
 */
export type LogThreshold = LogLevel | 'silent';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && value in LEVEL_ORDER;
}

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const envLevel = process.env['LOG_LEVEL'];
let threshold: LogThreshold = isLogThreshold(envLevel) ? envLevel : 'info';

/**
 * Change the minimum level written by the logger.
 */
export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function formatLog(entry: LogEntry): string {
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

/**
 * Error details for the `data` argument of a log call.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, name: error.name };
  }
  return { error: String(error) };
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) {
      console.debug(formatLog(createLogEntry('debug', message, data)));
    }
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) {
      console.info(formatLog(createLogEntry('info', message, data)));
    }
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) {
      console.warn(formatLog(createLogEntry('warn', message, data)));
    }
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) {
      console.error(formatLog(createLogEntry('error', message, data)));
    }
  },
};
