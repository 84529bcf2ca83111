/**
 * Structured console logger.
 *
 * Every line carries a `[scope]` tag and, when given, a JSON context
 * object. The minimum level comes from `LOG_LEVEL` (default `info`).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

function resolveLevel(level: LogLevel | undefined): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const minLevel = LOG_LEVELS[resolveLevel(level)];

  function log(lvl: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[lvl] < minLevel) return;

    const line = context
      ? `[${scope}] ${message} ${JSON.stringify(context)}`
      : `[${scope}] ${message}`;

    if (lvl === 'error') {
      console.error(line);
    } else if (lvl === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}
