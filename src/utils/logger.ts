import pino from 'pino';
import { env } from '@/config/env';

/**
 * Root pino instance
 * In development: pretty-printed for human readability
 * Elsewhere: JSON lines for log aggregation
 */
export const logger = pino({
  name: 'quote-gateway',
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development' && env.LOG_PRETTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
