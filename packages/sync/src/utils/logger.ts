import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger wrapper for policy synchronization
 */
export class Logger {
  private pino: pino.Logger;

  constructor(name: string = 'policy-sync', level: LogLevel = 'info', instance?: pino.Logger) {
    const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
    this.pino = instance ?? pino({
      name,
      level,
      transport: pretty && level !== 'silent'
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

  debug(message: string, data?: unknown): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: unknown): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: unknown): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error(error, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(undefined, undefined, this.pino.child(bindings));
  }
}

