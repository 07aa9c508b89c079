import pino, { type Logger } from 'pino';

/**
 * Logger interface for dependency injection
 * Matches Pino logger structure
 *
 * Every component receives its logger through the constructor; only the entry
 * point creates one.
 */
export interface ILogger {
  info(msg: string): void;
  info(obj: Record<string, unknown>): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** error, warn, info, debug - defaults to LOG_LEVEL or 'info' */
  level?: string;
  /** Defaults to NODE_ENV or 'development' */
  env?: string;
}

/**
 * Structured Logger using Pino
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug) - defaults to 'info'
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON
 *
 * **Usage:**
 * ```typescript
 * const logger = createLogger();
 *
 * logger.error({
 *   msg: 'Failed to render card',
 *   email: 'jane.smith@example.com',
 *   category: 'birthday',
 *   error: error.message,
 * });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const env = options.env ?? process.env.NODE_ENV ?? 'development';
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

  return pino({
    level,
    // pino-pretty only for local development, never in tests
    transport:
      env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: { env },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Renders an unknown throwable for a log entry or a report line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
