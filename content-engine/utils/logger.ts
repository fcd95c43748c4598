/**
 * Logger contract used across the content engine.
 *
 * Modules take an optional logger function and default to a no-op, so library
 * code stays quiet unless an entry point wires a real sink in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const silentLogger: Logger = () => {};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console-backed logger with a minimum level
 */
export function createConsoleLogger(minLevel: LogLevel = 'info', scope?: string): Logger {
  const threshold = LEVEL_ORDER[minLevel];

  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const prefix = `[${new Date().toISOString()}] ${level.toUpperCase()}${scope ? ` (${scope})` : ''}`;
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
