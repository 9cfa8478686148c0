/**
 * Logging
 *
 * Structured, level-filtered logger writing one JSON line per entry to the
 * console. Library objects default to `silentLogger`; callers opt in by
 * passing a logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(fields: LogContext): Logger;
}

export interface ConsoleLoggerOptions {
  /** Logger name, emitted as the `logger` field (default: 'supabase-scoped-session') */
  readonly name?: string;
  /** Minimum level written (default: 'info') */
  readonly level?: LogLevel;
  /** Fields added to every entry */
  readonly fields?: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console-backed JSON logger
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_PRIORITY[options.level ?? 'info'];
  const baseFields: LogContext = {
    logger: options.name ?? 'supabase-scoped-session',
    ...options.fields,
  };

  const build = (fields: LogContext): Logger => {
    const write = (level: LogLevel, message: string, context?: LogContext): void => {
      if (LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      const line = JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...fields,
        ...context,
      });

      if (level === 'error') {
        console.error(line);
      } else if (level === 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    };

    return {
      debug: (message, context) => write('debug', message, context),
      info: (message, context) => write('info', message, context),
      warn: (message, context) => write('warn', message, context),
      error: (message, context) => write('error', message, context),
      child: (extra) => build({ ...fields, ...extra }),
    };
  };

  return build(baseFields);
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
