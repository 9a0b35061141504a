/**
 * Minimal levelled logger writing through `console`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFn = (message: string, data?: unknown) => void;

export interface Logger {
  readonly debug: LogFn;
  readonly info: LogFn;
  readonly warn: LogFn;
  readonly error: LogFn;
}

export interface LoggerOptions {
  /**
   * Lowest level written.
   * @default process.env.GQLSERVE_LOG_LEVEL ?? 'info'
   */
  readonly level?: LogLevel;

  /**
   * @default '[gqlserve]'
   */
  readonly prefix?: string;

  /**
   * Destination per level.
   * @default console
   */
  readonly sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.GQLSERVE_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Creates a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.info('Server started', { port: 4000 });
 * // [gqlserve] Server started { port: 4000 }
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = defaultLevel(), prefix = '[gqlserve]', sink = console } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: Exclude<LogLevel, 'silent'>): LogFn => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return () => {};
    }
    return (message, data) => {
      if (data === undefined) {
        sink[entryLevel](`${prefix} ${message}`);
      } else {
        sink[entryLevel](`${prefix} ${message}`, data);
      }
    };
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
