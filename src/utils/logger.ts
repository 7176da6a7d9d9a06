/**
 * Logger utility using Pino
 *
 * Component loggers are children of one base logger. Level and pretty
 * printing come from the RAIL_LOG_LEVEL / RAIL_LOG_PRETTY settings.
 */

import pino, { type Logger } from 'pino';
import pretty from 'pino-pretty';
import { ConfigurationService } from '../infrastructure/config/ConfigurationService';

export type { Logger };

const settings = ConfigurationService.getInstance().getLoggingSettings();

/**
 * Base logger instance
 */
export const logger: Logger = settings.prettyPrint
  ? pino(
      { level: settings.level },
      pretty({
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        sync: true,
      })
    )
  : pino({ level: settings.level });

/**
 * Create a child logger for a specific component
 *
 * @example
 * const log = createChildLogger('pool');
 * log.info({ chainId: 1 }, 'Primary RPC set');
 */
export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
