/**
 * Logger Utility
 *
 * Contextual logging for the recommender. The level comes from LOG_LEVEL when
 * set, otherwise from NODE_ENV. Metadata is sanitised before it is written.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'auth', 'session'];

/**
 * Parses a level name such as "warn" or "DEBUG"; unknown names yield null
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  switch (value.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return null;
  }
}

function getCurrentLogLevel(): LogLevel {
  const explicit = parseLogLevel(process.env.LOG_LEVEL);
  if (explicit !== null) return explicit;

  const env = process.env.NODE_ENV || 'development';
  if (env === 'test') return LogLevel.ERROR;
  if (env === 'production') return LogLevel.WARN;
  return LogLevel.DEBUG;
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: string,
  now: Date = new Date()
): string {
  const contextStr = context ? `[${context}] ` : '';
  return `${now.toISOString()} ${LOG_LEVEL_NAMES[level]} ${contextStr}${message}`;
}

/**
 * Redacts values whose keys look like credentials
 */
export function sanitise(data: unknown): unknown {
  if (typeof data !== 'object' || data === null) {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map(sanitise);
  }

  const sanitised: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    sanitised[key] = SENSITIVE_KEYS.some(k => lowerKey.includes(k))
      ? '[REDACTED]'
      : sanitise(value);
  }
  return sanitised;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>, context?: string): void {
  if (level < getCurrentLogLevel()) {
    return;
  }

  const formattedMessage = formatLogEntry(level, message, context);
  const write = level >= LogLevel.WARN ? console.error : console.log;

  if (meta) {
    write(formattedMessage, sanitise(meta));
  } else {
    write(formattedMessage);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

/**
 * Create a contextual logger
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => log(LogLevel.DEBUG, message, meta, context),
    info: (message, meta) => log(LogLevel.INFO, message, meta, context),
    warn: (message, meta) => log(LogLevel.WARN, message, meta, context),
    error: (message, error, meta) => {
      const errorMeta = error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : { ...meta, error };
      log(LogLevel.ERROR, message, errorMeta, context);
    },
  };
}

export const logger = createLogger('recommender');
