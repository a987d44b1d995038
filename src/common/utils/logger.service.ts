import { Injectable, LoggerService } from '@nestjs/common';
import { join } from 'path';
import { createLogger, format, Logger, transports } from 'winston';

export interface AppLoggerOptions {
  level?: string;
  /** Directory for `error.log` and `combined.log`. */
  directory?: string;
  /** JSON on the console as well; defaults to on in production. */
  json?: boolean;
}

/** Nest hands over strings, errors and plain objects. */
export function toLogMessage(message: unknown): string {
  if (typeof message === 'string') {
    return message;
  }
  if (message instanceof Error) {
    return message.message;
  }
  try {
    return JSON.stringify(message) ?? String(message);
  } catch {
    return String(message);
  }
}

const consoleLine = format.printf(
  ({ timestamp, level, message, context }) => `${timestamp} ${level} [${context ?? 'App'}] ${message}`,
);

@Injectable()
export class AppLogger implements LoggerService {
  private readonly logger: Logger;

  constructor(options: AppLoggerOptions = {}) {
    const directory = options.directory ?? process.env.LOG_DIR ?? 'logs';
    const json = options.json ?? process.env.NODE_ENV === 'production';

    this.logger = createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
      transports: [
        new transports.Console({
          format: json ? format.json() : format.combine(format.colorize(), consoleLine),
        }),
        new transports.File({ filename: join(directory, 'error.log'), level: 'error' }),
        new transports.File({ filename: join(directory, 'combined.log') }),
      ],
    });
  }

  log(message: unknown, context?: string) {
    this.logger.info(toLogMessage(message), { context });
  }

  error(message: unknown, trace?: string, context?: string) {
    this.logger.error(toLogMessage(message), {
      trace: trace ?? (message instanceof Error ? message.stack : undefined),
      context,
    });
  }

  warn(message: unknown, context?: string) {
    this.logger.warn(toLogMessage(message), { context });
  }

  debug(message: unknown, context?: string) {
    this.logger.debug(toLogMessage(message), { context });
  }

  verbose(message: unknown, context?: string) {
    this.logger.verbose(toLogMessage(message), { context });
  }
}
