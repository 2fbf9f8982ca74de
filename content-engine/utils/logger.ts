/**
 * Logger used across the content engine.
 *
 * Components take an optional logger function and call it as
 * `this.logger?.('info', 'message', { ... })`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger filtered by minimum level (defaults to LOG_LEVEL or info)
 */
export function createConsoleLogger(minLevel?: LogLevel, scope?: string): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const threshold = LEVEL_ORDER[minLevel ?? (isLogLevel(envLevel) ? envLevel : 'info')];

  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold) return;

    const prefix = `[${new Date().toISOString()}] ${level.toUpperCase()}${scope ? ` [${scope}]` : ''}`;
    const line = data && Object.keys(data).length > 0
      ? `${prefix} ${message} ${JSON.stringify(data)}`
      : `${prefix} ${message}`;

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * Child logger that tags every entry with a scope
 */
export function withScope(logger: Logger | undefined, scope: string): Logger | undefined {
  if (!logger) return undefined;
  return (level, message, data) => logger(level, `[${scope}] ${message}`, data);
}
