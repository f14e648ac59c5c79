import { pino, type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'quotecast',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
