/**
 * CLI logger
 */

import { Logger, LoggerAdapter, LogLevel, logger } from '@tallykit/serialization';

/**
 * Global CLI logger instance
 */
export const cliLogger = logger.child('cli');

/**
 * Create the logger for one command run at the configured level
 */
export function createCliLogger(level: LogLevel, adapter?: LoggerAdapter): Logger {
  return new Logger({ level, context: 'tallykit:cli', adapter });
}
