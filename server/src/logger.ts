import pino, { type Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

export function createLogger(level: AppConfig['logLevel']): Logger {
  return pino({
    name: 'phone-free-desk',
    level
  });
}
