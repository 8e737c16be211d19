import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export interface LoggerOptions {
  level: LogLevel;
  serviceName: string;
}

/**
 * JSON logger with ISO timestamps. Every line carries `service`;
 * credentials are stripped wherever they appear in the bound context.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    base: { service: options.serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['password', 'passwordHash', '*.password', '*.passwordHash'],
      remove: true,
    },
  });
}
