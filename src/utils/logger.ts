/**
 * Pino logger shared by the CLI and the logging reporter
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  const isDevelopment = config.app.env === 'development';

  return pino({
    level: config.logging.level,
    base: {
      service: config.app.name,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    }),
  });
}

export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
