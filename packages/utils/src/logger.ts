import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  /** Extra transports, e.g. a file or in-memory sink */
  transports?: winston.transport[];
}

// Logger
export class Logger {
  private logger: winston.Logger;
  private readonly name: string;
  private readonly options: LoggerOptions;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.options = options;
    this.logger = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        }),
        ...(options.transports || [])
      ]
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else if (error !== undefined) {
      this.logger.error(message, { error, ...meta });
    } else {
      this.logger.error(message, meta);
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, this.options);
  }

  getName(): string {
    return this.name;
  }

  // Underlying winston logger, for libraries that take one directly
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
