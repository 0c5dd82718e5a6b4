import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type CreateLoggerOptions = {
  level?: string;
  name?: string;
  destination?: DestinationStream;
};

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? fallback;
}

export const createLoggerOptions = (level: string, name?: string): LoggerOptions => ({
  level: normalizeLogLevel(level),
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions = createLoggerOptions(options.level ?? process.env.SERIES_IMPORT_LOG_LEVEL ?? 'info', options.name);
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

export type { Logger };
