import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const createLoggerOptions = (level: LogLevel, name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/**
 * Command-line tools log to stderr so stdout stays free for program output.
 */
export function createLogger(level: LogLevel, name?: string): Logger {
  return pino(createLoggerOptions(level, name), pino.destination({ fd: 2, sync: true }));
}

export type { Logger };
