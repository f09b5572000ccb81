import pino from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'gateway' },
  transport: config.isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
