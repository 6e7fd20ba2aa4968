import pino, { type Logger } from 'pino';
import { getLogLevel } from './config.js';

export type { Logger };

export const logger: Logger = pino({
  name: 'fitledger',
  level: getLogLevel(),
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
