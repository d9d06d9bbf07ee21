/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface used by every component.
 * Implement this interface to route logs into pino, winston, etc.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Minimum log level to output (default: 'info') */
  minLevel?: LogLevel;
  /** Name prepended to every message, e.g. `session-manager` */
  scope?: string;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Reduce an unknown thrown value to something JSON can carry.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const described: Record<string, unknown> = { name: error.name, message: error.message };
    if ('kind' in error && typeof error.kind === 'string') {
      described['kind'] = error.kind;
    }
    return described;
  }
  return { message: String(error) };
}

/**
 * Create a console logger with optional log level filtering.
 *
 * @param options - Minimum level (or the options object)
 * @returns A Logger instance
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ minLevel: 'debug', scope: 'auth' });
 * logger.info('User session created', { identity: 'alice@example.com' });
 * // [INFO] auth: User session created {"identity":"alice@example.com"}
 * ```
 */
export function createConsoleLogger(options: LogLevel | ConsoleLoggerOptions = 'info'): Logger {
  const { minLevel = 'info', scope } =
    typeof options === 'string' ? { minLevel: options, scope: undefined } : options;
  const prefix = scope ? `${scope}: ` : '';

  const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= LEVELS[minLevel];

  const format = (level: LogLevel, message: string, meta?: Record<string, unknown>): string => {
    let suffix = '';
    if (meta && Object.keys(meta).length > 0) {
      try {
        suffix = ' ' + JSON.stringify(meta);
      } catch {
        suffix = ' [unserializable]';
      }
    }
    return `[${level.toUpperCase()}] ${prefix}${message}${suffix}`;
  };

  return {
    debug(message, meta): void {
      if (shouldLog('debug')) console.debug(format('debug', message, meta));
    },
    info(message, meta): void {
      if (shouldLog('info')) console.info(format('info', message, meta));
    },
    warn(message, meta): void {
      if (shouldLog('warn')) console.warn(format('warn', message, meta));
    },
    error(message, meta): void {
      if (shouldLog('error')) console.error(format('error', message, meta));
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
