import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type PipelineLogger = Logger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

const loggerOptions = (level: LogLevel): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(level: string = 'info', destination?: DestinationStream): PipelineLogger {
  const options = loggerOptions(resolveLogLevel(level));
  return destination ? pino(options, destination) : pino(options);
}

export const silentLogger: PipelineLogger = pino({ level: 'silent' });
