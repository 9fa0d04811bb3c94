import { pino, stdSerializers, type Logger } from 'pino';
import { loadConfig } from './config.js';

export type { Logger } from 'pino';

let root: Logger | undefined;

function rootLogger(): Logger {
  if (!root) {
    const config = loadConfig();
    root = pino({
      name: config.logName,
      level: config.logLevel,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: stdSerializers.err,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return root;
}

/**
 * Logger for one library component
 *
 * The root logger is created on first use from `loadConfig()`.
 */
export function createLogger(component: string): Logger {
  return rootLogger().child({ component });
}

/**
 * Replace the root logger, e.g. to route library logs into a host service's logger
 */
export function setRootLogger(logger: Logger): void {
  root = logger;
}
