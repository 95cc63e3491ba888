/**
 * Pino logger configuration
 */

import pino from 'pino';
import { config } from '../config/index.js';

const usePrettyTransport = !config.isProduction && !config.isTest;

export const logger = pino({
  level: config.logLevel,
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ name });
}
