import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  return pino({
    name: service,
    level: process.env.LOG_LEVEL || 'info',
    base: { service },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

export function createChildLogger(parentLogger: Logger, bindings: Record<string, unknown>): Logger {
  return parentLogger.child(bindings);
}

export type { Logger, LoggerOptions };
