import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel,
  transport: config.logPretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:standard',
        },
      }
    : undefined,
  base: {
    service: 'near-balance-monitor',
  },
});

/**
 * Message of an unknown thrown value, for structured log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
