/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for the login flow.
 * Implement this interface to use a custom logger.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: unknown): void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Text placed after the level tag, e.g. `oauth2` gives `[INFO] [oauth2] ...` */
  prefix?: string;
}

/** Metadata keys whose values are replaced before anything is written. */
const SENSITIVE_KEYS = new Set([
  'access_token',
  'accesstoken',
  'authorization',
  'client_secret',
  'clientsecret',
  'code',
  'id_token',
  'password',
  'refresh_token',
  'token',
]);

const REDACTED = '[REDACTED]';

/**
 * Replace sensitive values in log metadata.
 * Nested objects are walked; Error values become `{ name, message, reason }`.
 */
export function redactMeta(meta: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (meta !== null && typeof meta === 'object') {
    if (seen.has(meta)) return '[Circular]';
    seen.add(meta);
  }
  if (meta instanceof Error) {
    const reason: unknown = Reflect.get(meta, 'reason');
    return {
      name: meta.name,
      message: meta.message,
      ...(typeof reason === 'string' ? { reason } : {}),
    };
  }
  if (Array.isArray(meta)) {
    return meta.map((item) => redactMeta(item, seen));
  }
  if (meta !== null && typeof meta === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactMeta(value, seen);
    }
    return result;
  }
  return meta;
}

/**
 * Create a console logger with optional log level filtering.
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param options - Output options
 * @returns A Logger instance
 */
export function createConsoleLogger(
  minLevel: LogLevel = 'info',
  options: ConsoleLoggerOptions = {}
): Logger {
  const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  const prefix = options.prefix ? ` [${options.prefix}]` : '';

  const shouldLog = (level: LogLevel): boolean => {
    return levels[level] >= levels[minLevel];
  };

  const formatMeta = (meta?: unknown): string => {
    if (meta === undefined) return '';
    try {
      return ' ' + JSON.stringify(redactMeta(meta));
    } catch {
      return ' [unserializable]';
    }
  };

  return {
    debug(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('debug')) {
        console.debug(`[DEBUG]${prefix} ${message}${formatMeta(meta)}`);
      }
    },
    info(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('info')) {
        console.info(`[INFO]${prefix} ${message}${formatMeta(meta)}`);
      }
    },
    warn(message: string, meta?: Record<string, unknown>): void {
      if (shouldLog('warn')) {
        console.warn(`[WARN]${prefix} ${message}${formatMeta(meta)}`);
      }
    },
    error(message: string, meta?: unknown): void {
      if (shouldLog('error')) {
        console.error(`[ERROR]${prefix} ${message}${formatMeta(meta)}`);
      }
    },
  };
}

/**
 * No-op logger that discards all log messages.
 * Useful for testing or when logging is not desired.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
