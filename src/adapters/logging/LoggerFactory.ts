/**
 * Logger Factory
 *
 * Hands out ILogger instances scoped to a component name. All of them are
 * children of the root pino logger in utils/logger.ts.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { logger as rootLogger } from '@/utils/logger';
import { PinoLogger } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new PinoLogger(context ? rootLogger.child({ context }) : rootLogger);
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
