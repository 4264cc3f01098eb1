/**
 * Logger Factory
 *
 * Builds one root pino instance from the environment and hands out
 * named children wrapped in the ILogger adapter.
 *
 * Destination:
 * - LOG_FILE set → appended to that file
 * - otherwise → stderr (pretty-printed when LOG_PRETTY in development)
 */

import pino from 'pino';
import { env } from '@/config/env';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { PinoLogger } from './PinoLogger';

function createRootLogger(): pino.Logger {
  const base: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: 'ledger-cli' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Pretty printing only in development, and only when logs go to the terminal
  if (env.NODE_ENV === 'development' && env.LOG_PRETTY && !env.LOG_FILE) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  const options: pino.LoggerOptions = {
    ...base,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };

  return pino(options, pino.destination({ dest: env.LOG_FILE || 2, sync: true }));
}

export class LoggerFactory implements ILoggerFactory {
  constructor(private root: pino.Logger = createRootLogger()) {}

  createLogger(context?: string): ILogger {
    return new PinoLogger(context ? this.root.child({ context }) : this.root);
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
