import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type CreateLoggerOptions = {
  name: string;
  level?: LogLevel;
};

export const createLoggerOptions = (name: string, level: LogLevel): LoggerOptions => ({
  name,
  level,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions): Logger {
  return pino(createLoggerOptions(options.name, options.level ?? 'info'));
}

export type { Logger };
