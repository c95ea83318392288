import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Human-readable output via pino-pretty; defaults to on outside production and test */
  pretty?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

function defaultPretty(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

/**
 * Logger wrapper for the neural engine
 */
export class Logger {
  private pino: PinoLogger;

  constructor(options: LoggerOptions = {}) {
    const pretty = options.pretty ?? defaultPretty();
    this.pino = pino({
      name: options.name ?? 'logic-net',
      level: options.level ?? 'info',
      transport: pretty
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
  }

  get level(): string {
    return this.pino.level;
  }

  debug(message: string, data?: object): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: object): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: object): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error !== undefined) {
      this.pino.error({ detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ pretty: false });
    child.pino = this.pino.child(bindings);
    return child;
  }
}

// Default logger instance
export const logger = new Logger({
  level: parseLogLevel(process.env.LOGIC_NET_LOG_LEVEL),
});
