import { LOG_LEVELS, Logger, type LogLevel } from '@logic-net/neural';
import type { ServerConfig } from '../config/types.js';

export { Logger };

export function isLogLevelName(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger for a configured server; `text` format is pretty-printed outside tests
 */
export function createServerLogger(logging: ServerConfig['logging']): Logger {
  return new Logger({
    name: 'logic-net-server',
    level: logging.level,
    pretty: logging.format === 'text' && process.env.NODE_ENV !== 'test',
  });
}

